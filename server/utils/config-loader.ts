import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { HarvesterConfig } from '../types';

const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  deviceScaleFactor: z.number().positive().optional(),
});

/**
 * Every key is optional in harvester.config.json; missing keys take the defaults below.
 */
export const harvesterConfigSchema: z.ZodType<HarvesterConfig, z.ZodTypeDef, unknown> = z.object({
  feed: z.object({
    baseUrl: z.string().url().default('https://collectionapi.metmuseum.org/public/collection/v1'),
    timeoutMs: z.number().int().positive().default(20000),
  }).default({}),
  site: z.object({
    objectPageUrl: z.string().includes('{id}').default('https://www.metmuseum.org/art/collection/search/{id}'),
  }).default({}),
  browser: z.object({
    executablePath: z.string().optional(),
    headless: z.boolean().default(true),
    viewport: viewportSchema.default({ width: 1920, height: 1080 }),
    userAgent: z.string().default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    ),
  }).default({}),
  navigation: z.object({
    timeoutMs: z.number().int().positive().default(90000),
    waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle0', 'networkidle2']).default('domcontentloaded'),
    settleMs: z.number().int().min(0).default(1500),
  }).default({}),
  tabs: z.object({
    labels: z.array(z.string().min(1)).default([
      'Overview',
      'Signatures, Inscriptions, and Markings',
      'Provenance',
      'References',
    ]),
    regionHeading: z.string().min(1).default('Artwork Details'),
    ignoredLines: z.array(z.string()).default(['Artwork Details', 'Object Information']),
    clickTimeoutMs: z.number().int().positive().default(5000),
    quietWindowMs: z.number().int().positive().default(800),
    maxWaitMs: z.number().int().positive().default(8000),
    graceMs: z.number().int().min(0).default(1000),
  }).default({}),
  description: z.object({
    containerSelector: z.string().default('span[data-sentry-component="LegacyOrMarkdownParser"]'),
    wrapperClass: z.string().default('read-more-wrapper'),
    ancestorDepth: z.number().int().min(1).default(6),
    spanSelector: z.string().default('span[data-sentry-component="LegacyOrMarkdownParser"]'),
    minChars: z.number().int().min(1).default(40),
    minWords: z.number().int().min(1).default(30),
    boilerplatePatterns: z.array(z.string()).default([
      '^The Met presents over',
      'we use cookies',
      'sign up for (our|email)',
      'skip to main content',
      'all rights reserved',
    ]),
  }).default({}),
  images: z.object({
    rootDir: z.string().min(1).default('downloaded_images'),
    heroSelector: z.string().default('main img[class*="artwork__image"]'),
    gallerySelector: z.string().default('main [class*="carousel"] img, main [class*="thumbnail"] img'),
    maxAdditional: z.number().int().min(0).default(8),
    timeoutMs: z.number().int().positive().default(20000),
    retryAttempts: z.number().int().min(1).default(3),
    retryBaseDelayMs: z.number().int().min(0).default(1000),
  }).default({}),
  thumbnails: z.object({
    enabled: z.boolean().default(false),
    dir: z.string().min(1).default('thumbnails'),
    size: z.number().int().positive().default(150),
  }).default({}),
  checkpoint: z.object({
    flushEvery: z.number().int().min(1).default(25),
    flushRetryAttempts: z.number().int().min(1).default(3),
    flushRetryDelayMs: z.number().int().min(0).default(1000),
  }).default({}),
  pacing: z.object({
    politeDelayMs: z.number().int().min(0).default(500),
    minVarianceMs: z.number().int().min(0).default(0),
    maxVarianceMs: z.number().int().min(0).default(500),
  }).default({}),
  logging: z.object({
    file: z.string().nullable().default('logs/harvest.log'),
  }).default({}),
});

/**
 * Default configuration values for the harvester
 * Used as fallback when harvester.config.json cannot be loaded
 */
export const DEFAULT_CONFIG: HarvesterConfig = harvesterConfigSchema.parse({});

/**
 * Load harvester configuration from harvester.config.json
 * Falls back to default configuration if file cannot be loaded or fails validation
 */
export function loadHarvesterConfig(configPath: string = path.join(process.cwd(), 'harvester.config.json')): HarvesterConfig {
  try {
    const configData = fs.readFileSync(configPath, 'utf-8');
    const result = harvesterConfigSchema.safeParse(JSON.parse(configData));
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      console.warn(`⚠️  Invalid ${path.basename(configPath)}, using defaults: ${issues}`);
      return DEFAULT_CONFIG;
    }
    console.log(`✓ Loaded harvester configuration from ${path.basename(configPath)}`);
    return result.data;
  } catch (error) {
    console.warn(`⚠️  Could not load ${path.basename(configPath)}, using defaults:`, error instanceof Error ? error.message : error);
    return DEFAULT_CONFIG;
  }
}
