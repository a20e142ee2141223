export type EditorName = 'resolve' | 'premiere';

export const EDITOR_NAMES: EditorName[] = ['resolve', 'premiere'];

/**
 * A time range of a video to bring into an editor
 */
export interface ClipRequest {
  videoPath: string;
  startMs: number;
  endMs: number;
  /** Label shown in the editor */
  name: string;
}

export interface EditorReadiness {
  ready: boolean;
  /** Why the editor is not ready; empty when it is */
  problems: string[];
}

/**
 * A file written for the editor to import
 */
export interface EditorImport {
  editor: EditorName;
  outputPath: string;
  frameRate: number;
}

/**
 * Inspects media files. FFmpegProcessor is the real implementation.
 */
export interface MediaProbe {
  isAvailable(): boolean;
  getFrameRate(videoPath: string): Promise<number>;
  getDurationMs(videoPath: string): Promise<number>;
}

export interface EditorDependencies {
  importDir: string;
  probe: MediaProbe;
}

/**
 * Editor integration interface - all editors must implement this
 */
export interface EditorIntegration {
  readonly name: EditorName;
  readonly label: string;

  /**
   * Reports whether clips can be sent to the editor right now
   */
  checkReadiness(): Promise<EditorReadiness>;

  /**
   * Prepares a whole video for import
   */
  importMedia(videoPath: string): Promise<EditorImport>;

  /**
   * Prepares a range of a video for import
   */
  importClip(clip: ClipRequest): Promise<EditorImport>;

  detectFrameRate(videoPath: string): Promise<number>;
}

export class UnknownEditorError extends Error {
  constructor(public readonly editor: string) {
    super(`Unknown editor: ${editor}`);
    this.name = 'UnknownEditorError';
  }
}
