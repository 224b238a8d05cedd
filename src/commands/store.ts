import * as fs from "node:fs/promises";
import path from "node:path";
import {
    InvalidInputError,
    MANIFEST_FILENAME,
    PackageStore,
    logWarn,
    type StoredPackage,
} from "@stashlink/core";
import { discoverFiles } from "../utils/fileDiscovery.js";

export interface PutOptions {
    /** Manifest file; defaults to <dir>/stashlink.json, or a generated one */
    manifest?: string;
    ignore?: string[];
    freeze?: boolean;
}

export interface PutReport {
    hash: string;
    files: string[];
    /** The package was already in the store; nothing was written */
    alreadyStored: boolean;
    frozen: boolean;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch {
        return false;
    }
}

async function readManifestFor(sourceDir: string, manifestOption: string | undefined): Promise<{ bytes: Buffer; path: string | null }> {
    const manifestPath = manifestOption ? path.resolve(manifestOption) : path.join(sourceDir, MANIFEST_FILENAME);
    if (await fileExists(manifestPath)) {
        return { bytes: await fs.readFile(manifestPath), path: manifestPath };
    }
    if (manifestOption) {
        throw new InvalidInputError(`manifest not found: ${manifestPath}`);
    }
    // Minimal manifest when the directory has none
    const generated = JSON.stringify({ name: path.basename(sourceDir) }, null, 2) + "\n";
    return { bytes: Buffer.from(generated, "utf8"), path: null };
}

/**
 * Store a directory's files and manifest, then freeze the stored tree
 */
export async function runPut(store: PackageStore, dir: string, options: PutOptions = {}): Promise<PutReport> {
    const sourceDir = path.resolve(dir);
    const manifest = await readManifestFor(sourceDir, options.manifest);

    const exclude: string[] = [];
    if (manifest.path) {
        const relative = path.relative(sourceDir, manifest.path);
        if (!relative.startsWith("..") && !path.isAbsolute(relative)) {
            exclude.push(relative.split(path.sep).join("/"));
        }
    }

    const files = await discoverFiles(sourceDir, { ignore: options.ignore ?? [], exclude });
    if (files.length === 0) {
        throw new InvalidInputError(`no files to store in ${sourceDir}`);
    }

    const { hash, created } = await store.commit(sourceDir, files, manifest.bytes);
    const report: PutReport = { hash, files, alreadyStored: !created, frozen: false };
    return finishPut(store, report, options.freeze ?? true);
}

async function finishPut(store: PackageStore, report: PutReport, freeze: boolean): Promise<PutReport> {
    if (!freeze) return report;
    try {
        await store.freeze(report.hash);
        return { ...report, frozen: true };
    } catch (error) {
        // best-effort: the package stays committed
        const message = error instanceof Error ? error.message : String(error);
        logWarn("put", `failed to make files read-only: ${message}`);
        return report;
    }
}

export async function runList(store: PackageStore): Promise<string[]> {
    return store.list();
}

export interface ShowReport {
    pkg: StoredPackage;
    files: string[];
    manifest: Record<string, unknown>;
}

export async function runShow(store: PackageStore, hash: string): Promise<ShowReport> {
    const pkg = await store.get(hash);
    const files = await store.listFiles(pkg.hash);
    const manifest = await store.readManifest(pkg.hash);
    return { pkg, files, manifest };
}

export async function runVerify(store: PackageStore, hash: string): Promise<string> {
    const pkg = await store.get(hash);
    await store.verify(pkg.hash);
    return pkg.hash;
}

export async function runRemove(store: PackageStore, hash: string): Promise<string> {
    const pkg = await store.get(hash);
    await store.delete(pkg.hash);
    return pkg.hash;
}
