import { EngineId } from "../shared/types/document.types";
import { TextExtractor } from "../documents/extractors/extractor.types";

export type ModuleResolver = (moduleName: string) => boolean;

export function resolveInstalledModule(moduleName: string): boolean {
  try {
    require.resolve(moduleName);
    return true;
  } catch {
    return false;
  }
}

/** Engines whose modules resolve, minus the ones switched off in config. */
export function detectEngineCapabilities(
  extractors: readonly TextExtractor[],
  resolveModule: ModuleResolver = resolveInstalledModule,
  disabledEngines: readonly EngineId[] = [],
): ReadonlySet<EngineId> {
  const disabled = new Set(disabledEngines);
  const available = new Set<EngineId>();
  for (const extractor of extractors) {
    if (disabled.has(extractor.id)) {
      continue;
    }
    if (extractor.requiredModules.every((moduleName) => resolveModule(moduleName))) {
      available.add(extractor.id);
    }
  }
  return available;
}
