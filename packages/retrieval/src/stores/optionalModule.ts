/**
 * Optional module probing.
 *
 * Backend client libraries are optional dependencies. They are probed at
 * factory time and loaded on first use.
 */

import { createRequire } from "node:module";
import { DependencyUnavailableError } from "@ragline/ai-core";

const require = createRequire(import.meta.url);

export function isModuleAvailable(specifier: string): boolean {
  try {
    require.resolve(specifier);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load an optional package, failing with an install hint when it is missing.
 */
export function loadOptionalModule<T>(specifier: string, feature: string): T {
  try {
    return require(specifier) as T;
  } catch (error) {
    throw new DependencyUnavailableError(specifier, feature, { cause: error });
  }
}
