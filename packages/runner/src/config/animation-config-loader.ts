import { readFileSync } from 'node:fs';

import { parse as parseYaml } from 'yaml';

import {
  AnimationConfigSchema,
  DEFAULT_ANIMATION_CONFIG,
  type AnimationConfig,
} from './animation-config-types.js';

function formatIssues(issues: readonly { readonly path: readonly PropertyKey[]; readonly message: string }[]): string {
  return issues.map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`).join('\n');
}

/** Missing fields take their defaults; anything malformed throws. */
export function parseAnimationConfigStrict(raw: unknown): AnimationConfig {
  if (raw === null || raw === undefined) {
    return DEFAULT_ANIMATION_CONFIG;
  }

  const parsed = AnimationConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid animation config schema:\n${formatIssues(parsed.error.issues)}`);
  }

  return parsed.data;
}

export function loadAnimationConfig(raw: unknown): AnimationConfig {
  if (raw === null || raw === undefined) {
    return DEFAULT_ANIMATION_CONFIG;
  }

  const parsed = AnimationConfigSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  console.warn('Invalid animation config; falling back to defaults.', parsed.error.issues);
  return DEFAULT_ANIMATION_CONFIG;
}

export function parseAnimationConfigYaml(text: string): AnimationConfig {
  return parseAnimationConfigStrict(parseYaml(text));
}

export function readAnimationConfigFile(path: string | URL): AnimationConfig {
  return parseAnimationConfigYaml(readFileSync(path, 'utf8'));
}
