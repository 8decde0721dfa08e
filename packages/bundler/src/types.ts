export type StylesheetSyntax = 'indented' | 'scss' | 'css';

export interface StylesheetOptions {
  readonly path: string;
  readonly syntax: StylesheetSyntax;
}

export interface BuildConfig {
  /** Where input files live. Usually the root of the web application crate. */
  readonly srcDir: string;
  /** Destination directory. Cleared and repopulated on every run. */
  readonly distDir: string;
  /** Scratch directory the toolchain writes its output to. */
  readonly tmpDir: string;
  /** Rendered into the template as `base_url`. Defaults to `/`. */
  readonly baseUrl?: string;
  /** Embedded into the module file name: `app-<wasmVersion>.wasm`. */
  readonly wasmVersion: string;
  readonly release: boolean;
  /** The toolchain's target directory is placed at `<workspaceRoot>/web-target`. */
  readonly workspaceRoot: string;
  readonly additionalWatchDirs: readonly string[];
  readonly stylesheet: StylesheetOptions;
}

export interface CompiledModuleArtifact {
  readonly wasmPath: string;
  readonly bootstrapScriptPath: string;
  readonly snippetsDir: string;
}

export interface RenderContext {
  readonly base_url: string;
  readonly javascript: string;
  readonly stylesheet: string;
}

export type BundleStage =
  | 'watch-list'
  | 'toolchain'
  | 'stage-output'
  | 'copy-static'
  | 'copy-snippets'
  | 'entry-document'
  | 'place-wasm';

export interface BundleReport {
  readonly distDir: string;
  readonly indexHtmlPath: string;
  readonly wasmFileName: string;
  readonly copiedDirectories: readonly string[];
  readonly toolchainAttempts: number;
  readonly watchDirectives: number;
  readonly durationMs: number;
}

export type BundleLogEvent =
  | {
      readonly name: 'bundle.started';
      readonly timestamp: string;
      readonly srcDir: string;
      readonly distDir: string;
      readonly wasmVersion: string;
      readonly release: boolean;
    }
  | {
      readonly name: 'toolchain.retry_scheduled';
      readonly timestamp: string;
      readonly attempt: number;
      readonly maxRetries: number;
      readonly waitMs: number;
    }
  | {
      readonly name: 'toolchain.completed';
      readonly timestamp: string;
      readonly attempts: number;
      readonly durationMs: number;
    }
  | {
      readonly name: 'bundle.stage_completed';
      readonly timestamp: string;
      readonly stage: BundleStage;
      readonly durationMs: number;
    }
  | {
      readonly name: 'bundle.completed';
      readonly timestamp: string;
      readonly distDir: string;
      readonly wasmFileName: string;
      readonly durationMs: number;
    }
  | {
      readonly name: 'bundle.failed';
      readonly timestamp: string;
      readonly stage?: BundleStage;
      readonly message: string;
      readonly stack?: string;
      readonly durationMs: number;
    };
