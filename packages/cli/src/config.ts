/**
 * .drafthouse/ Config Loader
 *
 * Loads CLI defaults from .drafthouse/config.json. Every key is optional;
 * unknown keys are rejected so typos surface instead of being ignored.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { CLIError } from './index';

// ============================================================================
// Schema
// ============================================================================

const PreviewConfigSchema = z.object({
  warpGlyph: z.string().length(1, 'Glyph must be a single character').default('#'),
  weftGlyph: z.string().length(1, 'Glyph must be a single character').default('.'),
  maxWarps: z.number().int().positive().default(60),
  maxWefts: z.number().int().positive().default(30),
}).strict();

export const DraftConfigSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
  /** Color range assumed when a draft has no COLOR PALETTE. */
  colorRange: z.tuple([z.number(), z.number()])
    .refine(([low, high]) => low < high, 'colorRange low must be below high')
    .default([0, 999]),
  preview: PreviewConfigSchema.default({}),
}).strict();

export type DraftConfig = z.infer<typeof DraftConfigSchema>;

export const DEFAULT_CONFIG: DraftConfig = DraftConfigSchema.parse({});

// ============================================================================
// Config Loading
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Load config from <configPath>/config.json.
 * Falls back to defaults if not found.
 */
export function loadConfig(configPath: string): DraftConfig {
  const configFile = path.join(configPath, 'config.json');

  if (!fs.existsSync(configFile)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CLIError(`Could not read ${configFile}: ${msg}`);
  }

  const result = DraftConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new CLIError(`Invalid config in ${configFile}:\n${describeIssues(result.error)}`);
  }
  return result.data;
}
