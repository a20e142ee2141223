import { EDITOR_NAMES, EditorDependencies, EditorIntegration, EditorName, UnknownEditorError } from './types';
import { ResolveIntegration } from './resolve';
import { PremiereIntegration } from './premiere';
import { FFmpegProcessor } from '../video';
import { config } from '../config';

const EDITORS: Record<EditorName, (deps: EditorDependencies) => EditorIntegration> = {
  resolve: (deps) => new ResolveIntegration(deps),
  premiere: (deps) => new PremiereIntegration(deps),
};

export function isEditorName(value: string): value is EditorName {
  return (EDITOR_NAMES as string[]).includes(value);
}

export function defaultEditorDependencies(): EditorDependencies {
  return {
    importDir: config.editorImportDir,
    probe: new FFmpegProcessor(),
  };
}

/**
 * Looks up the integration for an editor by name
 * @throws UnknownEditorError when no integration exists for the name
 */
export function getEditorIntegration(
  name: string,
  deps: EditorDependencies = defaultEditorDependencies()
): EditorIntegration {
  if (!isEditorName(name)) {
    throw new UnknownEditorError(name);
  }
  return EDITORS[name](deps);
}

/**
 * Tests every editor integration and returns readiness
 */
export async function checkAllEditors(
  deps: EditorDependencies = defaultEditorDependencies()
): Promise<Map<EditorName, boolean>> {
  const results = new Map<EditorName, boolean>();

  for (const name of EDITOR_NAMES) {
    const readiness = await getEditorIntegration(name, deps).checkReadiness();
    results.set(name, readiness.ready);
  }

  return results;
}
