import { GIT_SUBMODULE_MODE } from "../domain/blame-types.js";

/**
 * Parses `git ls-files -s -z` output (`<mode> <object> <stage>\t<path>` entries).
 * Submodule entries are dropped and conflict stages collapse to one path.
 */
export const parseLsFilesStage = (rawListing: string): readonly string[] => {
  const paths = new Set<string>();

  for (const entry of rawListing.split("\0")) {
    if (entry.length === 0) {
      continue;
    }

    const tabIndex = entry.indexOf("\t");
    if (tabIndex < 0) {
      continue;
    }

    const [mode] = entry.slice(0, tabIndex).split(" ");
    if (mode === GIT_SUBMODULE_MODE) {
      continue;
    }

    paths.add(entry.slice(tabIndex + 1));
  }

  return [...paths];
};
