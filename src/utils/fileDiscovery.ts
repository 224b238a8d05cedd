import { glob } from "glob";
import { sortPaths } from "@stashlink/core";
import { mergeIgnorePatterns } from "./ignorePatterns.js";

export interface DiscoverFilesOptions {
    /** Extra ignore patterns, merged with the defaults */
    ignore?: string[];
    /** Exact relative paths to leave out (e.g. the manifest itself) */
    exclude?: string[];
}

/**
 * List every file under `rootPath` as a relative POSIX path, sorted the way the store hashes them
 */
export async function discoverFiles(rootPath: string, { ignore = [], exclude = [] }: DiscoverFilesOptions = {}): Promise<string[]> {
    const matches = await glob("**/*", {
        cwd: rootPath,
        nodir: true, // Only return files, not directories
        dot: true, // Include dotfiles
        posix: true,
        ignore: mergeIgnorePatterns(ignore),
    });

    const excluded = new Set(exclude);
    return sortPaths(matches.filter((file) => !excluded.has(file)));
}
