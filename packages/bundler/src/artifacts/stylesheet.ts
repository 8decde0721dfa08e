import { promises as fsPromises } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import * as sass from 'sass';

import { BundleStageError, StylesheetCompileError, describeError } from '../errors.js';
import type { StylesheetOptions } from '../types.js';

/**
 * Compiles the project stylesheet to compressed CSS. Imports resolve
 * relative to the stylesheet's own directory.
 */
export async function compileStylesheet(options: StylesheetOptions): Promise<string> {
  let source: string;
  try {
    source = await fsPromises.readFile(options.path, 'utf8');
  } catch (error) {
    throw new BundleStageError(
      `Failed to read stylesheet ${options.path}: ${describeError(error)}`,
      'entry-document',
      options.path,
      { cause: error },
    );
  }

  try {
    const result = sass.compileString(source, {
      syntax: options.syntax,
      style: 'compressed',
      url: pathToFileURL(options.path),
      loadPaths: [path.dirname(options.path)],
    });
    return result.css;
  } catch (error) {
    throw new StylesheetCompileError(
      `Sass compilation failed: ${describeError(error)}`,
      options.path,
      { cause: error },
    );
  }
}

export function createStyleBlock(css: string): string {
  return `<style>${css}</style>`;
}
