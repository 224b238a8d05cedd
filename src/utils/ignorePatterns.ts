/**
 * Default ignore patterns for package file discovery
 */

// Names never worth storing in a package
export const DEFAULT_IGNORE_PATTERNS = [
    // Dependencies
    "node_modules",
    "bower_components",
    "__pycache__",
    ".venv",
    "venv",

    // Build outputs
    "dist",
    "build",
    "*.egg-info",

    // Cache and temp
    ".cache",
    ".pytest_cache",
    ".mypy_cache",
    "*.pyc",

    // Version control
    ".git",
    ".svn",
    ".hg",

    // IDE and editor
    ".vscode",
    ".idea",
    "*.swp",
    "*~",

    // OS files
    ".DS_Store",
    "Thumbs.db",

    // Our own project directory
    ".stashlink",
];

export function getDefaultIgnorePatterns(): string[] {
    return [...DEFAULT_IGNORE_PATTERNS];
}

/**
 * Expand name patterns into glob ignore patterns matching them at any depth,
 * both as files and as directories. Patterns containing a slash are taken as-is.
 */
export function mergeIgnorePatterns(customPatterns: string[] = []): string[] {
    const merged = new Set<string>();
    for (const pattern of [...DEFAULT_IGNORE_PATTERNS, ...customPatterns]) {
        if (pattern.includes("/")) {
            merged.add(pattern);
            continue;
        }
        merged.add(`**/${pattern}`);
        merged.add(`**/${pattern}/**`);
    }
    return [...merged];
}
