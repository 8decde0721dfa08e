import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

import nunjucks from 'nunjucks';

import { BundleStageError, TemplateRenderError, describeError, isNodeError } from '../errors.js';
import type { BuildConfig, CompiledModuleArtifact, RenderContext } from '../types.js';
import { compileStylesheet, createStyleBlock } from './stylesheet.js';
import { versionedWasmFileName } from './wasm.js';

type SafeString = InstanceType<typeof nunjucks.runtime.SafeString>;

export const ENTRY_TEMPLATE_FILENAME = 'index.html';
export const DEFAULT_BASE_URL = '/';

/**
 * Wraps wasm-pack's bootstrap script in a module script that initialises the
 * versioned module once the script body has run.
 */
export function createLoaderMarkup(bootstrapScript: string, wasmFileName: string): string {
  return `<script type="module">${bootstrapScript} init('${wasmFileName}'); </script>`;
}

/**
 * Renders the entry template with autoescaping on. Templates opt the two
 * injected fragments out with `{{ javascript | safe }}` and
 * `{{ stylesheet | safe }}`.
 *
 * Referencing a variable the context does not define is a render error,
 * including through `safe`, whose built-in version prints undefined as ''.
 */
export function renderEntryDocument(
  template: string,
  context: RenderContext,
  templatePath: string,
): string {
  const environment = new nunjucks.Environment(null, {
    autoescape: true,
    throwOnUndefined: true,
  });
  environment.addFilter('safe', markDefinedSafe);
  try {
    return environment.renderString(template, { ...context });
  } catch (error) {
    throw new TemplateRenderError(
      `Failed to render ${templatePath}: ${describeError(error)}`,
      templatePath,
      { cause: error },
    );
  }
}

function markDefinedSafe(value: unknown): SafeString {
  if (value instanceof nunjucks.runtime.SafeString) {
    return value;
  }
  if (value === undefined || value === null) {
    throw new Error('attempted to mark an undefined value as safe');
  }
  return new nunjucks.runtime.SafeString(String(value));
}

/**
 * Produces `index.html` in the dist directory from the project's template,
 * the compiled stylesheet and the toolchain's bootstrap script.
 *
 * @returns the path of the written document
 */
export async function bundleIndexHtml(
  config: BuildConfig,
  artifact: CompiledModuleArtifact,
): Promise<string> {
  const templatePath = path.join(config.srcDir, ENTRY_TEMPLATE_FILENAME);
  const template = await readRequiredFile(
    templatePath,
    'This should be a source code file checked into the repo.',
  );
  const bootstrapScript = await readRequiredFile(
    artifact.bootstrapScriptPath,
    'This should have been produced by wasm-pack.',
  );

  const css = await compileStylesheet(config.stylesheet);
  const context: RenderContext = {
    base_url: config.baseUrl ?? DEFAULT_BASE_URL,
    javascript: createLoaderMarkup(
      bootstrapScript,
      versionedWasmFileName(config.wasmVersion),
    ),
    stylesheet: createStyleBlock(css),
  };

  const rendered = renderEntryDocument(template, context, templatePath);

  const destination = path.join(config.distDir, ENTRY_TEMPLATE_FILENAME);
  try {
    await fsPromises.writeFile(destination, rendered, 'utf8');
  } catch (error) {
    throw new BundleStageError(
      `Failed to write the index.html file to ${destination}: ${describeError(error)}`,
      'entry-document',
      destination,
      { cause: error },
    );
  }
  return destination;
}

async function readRequiredFile(targetPath: string, hint: string): Promise<string> {
  try {
    return await fsPromises.readFile(targetPath, 'utf8');
  } catch (error) {
    const reason =
      isNodeError(error) && error.code === 'ENOENT' ? 'file not found' : describeError(error);
    throw new BundleStageError(
      `Failed to read ${targetPath} (${reason}). ${hint}`,
      'entry-document',
      targetPath,
      { cause: error },
    );
  }
}
