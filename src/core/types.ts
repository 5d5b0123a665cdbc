/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Clipboard content
// ---------------------------------------------------------------------------

/** A type identifier advertised by the clipboard owner, e.g. "image/png" or "UTF8_STRING". */
export type ClipboardTarget = string;

export type ContentKind = 'image' | 'text';

/** A decoded image held in memory as raw pixels. */
export interface Bitmap {
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
  pixels: Buffer;                          // width * height * channels bytes, row-major
}

export type ClipboardContent =
  | { kind: 'image'; target: ClipboardTarget; bitmap: Bitmap }
  | { kind: 'text'; target: ClipboardTarget; text: string };

export type RetrievalResult =
  | ClipboardContent
  | { kind: 'empty'; target: ClipboardTarget }
  | { kind: 'undecodable'; target: ClipboardTarget };

// ---------------------------------------------------------------------------
// Child processes
// ---------------------------------------------------------------------------

export interface RunOptions {
  timeoutMs?: number;                      // 0 or undefined = wait forever
  maxBuffer?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandResult>;

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export interface ClipboardBackend {
  readonly name: string;

  /** Targets in the order the clipboard owner reports them. Empty when nothing is copied. */
  listTargets(): Promise<ClipboardTarget[]>;

  /** Raw payload for one target. Zero-length when the owner had nothing to give. */
  read(target: ClipboardTarget): Promise<Buffer>;
}

export interface ClipboardBackendOptions {
  timeoutMs: number;
  run?: CommandRunner;
}

export interface FileFilter {
  label: string;                           // e.g. "PNG Image (*.png)"
  pattern: string;                         // e.g. "*.png"
}

export interface SaveDialogRequest {
  title: string;
  defaultName: string;
  filters: FileFilter[];
}

export interface DialogBackend {
  readonly name: string;

  /** Resolves with the chosen absolute path, or null when the user cancels. */
  showSaveDialog(request: SaveDialogRequest): Promise<string | null>;
}

export interface DialogBackendOptions {
  run?: CommandRunner;
}

/**
 * A backend implementation that can be picked automatically.
 * `detect` only inspects the environment; it never spawns anything.
 */
export interface BackendProvider<TBackend, TOptions> {
  name: string;
  detect(env: NodeJS.ProcessEnv): boolean;
  create(options: TOptions): TBackend;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type ClipboardBackendName = 'auto' | 'wayland' | 'x11';
export type DialogBackendName = 'auto' | 'zenity' | 'kdialog';

export interface SaveCbConfig {
  logLevel: LogLevel;
  clipboardBackend: ClipboardBackendName;
  dialogBackend: DialogBackendName;
  clipboardTimeoutMs: number;              // per clipboard exchange; 0 disables
  jpegQuality: number;                     // 1..100
}

// ---------------------------------------------------------------------------
// Exporter lifecycle
// ---------------------------------------------------------------------------

export type ExporterState =
  | 'init'
  | 'enumerating-targets'
  | 'retrieving-content'
  | 'showing-text-dialog'
  | 'showing-image-dialog'
  | 'no-format-found'
  | 'saved'
  | 'canceled'
  | 'save-failed'
  | 'terminated';

export type ExportOutcome =
  | { status: 'saved'; kind: ContentKind; path: string }
  | { status: 'canceled'; kind: ContentKind }
  | { status: 'save-failed'; kind: ContentKind; path: string; error: string }
  | { status: 'no-format'; targets: ClipboardTarget[] }
  | { status: 'empty'; target: ClipboardTarget }
  | { status: 'failed'; code: string; error: string };

/** User-facing output. Kept apart from the diagnostic log. */
export interface Reporter {
  info(message: string): void;
  error(message: string): void;
}
