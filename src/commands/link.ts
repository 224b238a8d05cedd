import {
    ImportsDirectory,
    InvalidInputError,
    PackageStore,
    TARGET_LANGUAGES,
    graft,
    installRegisterScript,
    isDirectory,
    probePythonEnvironment,
    removeDir,
    removeRegisterScript,
    ungraft,
    type EnvironmentDescriptor,
    type GraftResult,
    type PackageLink,
    type TargetLanguage,
} from "@stashlink/core";

export interface LinkOptions {
    name: string;
    hash: string;
    language: TargetLanguage;
    projectRoot: string;
    /** Locates the python environment; defaults to probing the current process */
    probe?: () => Promise<EnvironmentDescriptor>;
}

export interface LinkReport {
    linkPath: string;
    /** Set for python packages */
    graft?: GraftResult;
    /** Set for javascript packages */
    registerScript?: string;
    gitignoreUpdated: boolean;
}

export function parseLanguage(value: string): TargetLanguage {
    const language = TARGET_LANGUAGES.find((candidate) => candidate === value);
    if (!language) {
        throw new InvalidInputError(`unsupported language "${value}" (expected one of: ${TARGET_LANGUAGES.join(", ")})`);
    }
    return language;
}

/**
 * Make a stored package importable from a project
 */
export async function runLink(store: PackageStore, options: LinkOptions): Promise<LinkReport> {
    const pkg = await store.get(options.hash);
    const imports = new ImportsDirectory(options.projectRoot);

    const linkPath = await imports.linkPackage(options.name, options.language, pkg.filesDir);

    const report: LinkReport = { linkPath, gitignoreUpdated: false };
    if (options.language === "python") {
        const probe = options.probe ?? (() => probePythonEnvironment());
        const descriptor = await probe();
        report.graft = await graft(descriptor, imports.importsDir, imports.projectRoot);
    } else {
        report.registerScript = await installRegisterScript(imports.projectRoot);
    }

    report.gitignoreUpdated = await imports.updateGitignore();
    return report;
}

export interface UnlinkReport {
    /** Path-configuration file removed from a python environment */
    removedConfigFile: string | null;
    removedRegisterScript: boolean;
    /** Whether a .stashlink/ directory was there to remove */
    removedStashDir: boolean;
}

/**
 * Undo every link in a project: un-graft, drop the register script, remove .stashlink/
 */
export async function runUnlink(projectRoot: string): Promise<UnlinkReport> {
    const imports = new ImportsDirectory(projectRoot);
    const { removed } = await ungraft(imports.projectRoot);
    const removedRegisterScript = await removeRegisterScript(imports.projectRoot);
    const removedStashDir = await isDirectory(imports.stashDir);
    await removeDir(imports.stashDir);
    return { removedConfigFile: removed, removedRegisterScript, removedStashDir };
}

export async function runListLinks(projectRoot: string): Promise<PackageLink[]> {
    return new ImportsDirectory(projectRoot).listLinks();
}

/**
 * Drop a single package's link; the graft and register script stay in place
 */
export async function runUnlinkPackage(projectRoot: string, name: string, language: TargetLanguage): Promise<boolean> {
    return new ImportsDirectory(projectRoot).unlinkPackage(name, language);
}
