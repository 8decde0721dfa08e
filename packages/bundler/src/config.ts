import path from 'node:path';

import { z } from 'zod';

import { BundleConfigError } from './errors.js';
import type { BuildConfig } from './types.js';

export const DEFAULT_STYLESHEET_PATH = 'css/style.scss';

const WASM_VERSION_MAX_LENGTH = 128;

const pathSchema = z
  .string()
  .trim()
  .min(1, { message: 'Paths must contain at least one character.' });

const wasmVersionSchema = z
  .string()
  .trim()
  .min(1, { message: 'The wasm version must not be empty.' })
  .max(WASM_VERSION_MAX_LENGTH, {
    message: `The wasm version must contain at most ${WASM_VERSION_MAX_LENGTH} characters.`,
  })
  .regex(/^[0-9a-z._+-]+$/i, {
    message:
      'The wasm version may only contain letters, digits, ".", "_", "+", or "-" because it is embedded in a file name.',
  });

const stylesheetSchema = z
  .object({
    path: pathSchema.default(DEFAULT_STYLESHEET_PATH),
    syntax: z.enum(['indented', 'scss', 'css']).default('indented'),
  })
  .strict();

export const buildConfigSchema = z
  .object({
    srcDir: pathSchema,
    distDir: pathSchema,
    tmpDir: pathSchema,
    baseUrl: z.string().optional(),
    wasmVersion: wasmVersionSchema,
    release: z.boolean().default(false),
    workspaceRoot: pathSchema.optional(),
    additionalWatchDirs: z.array(pathSchema).default([]),
    stylesheet: stylesheetSchema.default({}),
  })
  .strict();

export type BuildConfigInput = z.input<typeof buildConfigSchema>;

export interface ParseBuildConfigOptions {
  /** Relative paths resolve against this directory. Defaults to `process.cwd()`. */
  readonly cwd?: string;
}

export function parseBuildConfig(
  input: unknown,
  options: ParseBuildConfigOptions = {},
): BuildConfig {
  const result = buildConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new BundleConfigError(
      ['Invalid bundler configuration:', ...issues.map((issue) => `  - ${issue}`)].join('\n'),
      issues,
    );
  }

  const cwd = options.cwd ?? process.cwd();
  const parsed = result.data;
  const srcDir = path.resolve(cwd, parsed.srcDir);

  return Object.freeze({
    srcDir,
    distDir: path.resolve(cwd, parsed.distDir),
    tmpDir: path.resolve(cwd, parsed.tmpDir),
    ...(parsed.baseUrl !== undefined ? { baseUrl: parsed.baseUrl } : {}),
    wasmVersion: parsed.wasmVersion,
    release: parsed.release,
    workspaceRoot: path.resolve(cwd, parsed.workspaceRoot ?? '.'),
    additionalWatchDirs: Object.freeze(
      parsed.additionalWatchDirs.map((dir) => path.resolve(cwd, dir)),
    ),
    stylesheet: Object.freeze({
      path: path.resolve(srcDir, parsed.stylesheet.path),
      syntax: parsed.stylesheet.syntax,
    }),
  });
}

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}
