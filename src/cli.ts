import { Command } from "commander";
import chalk from "chalk";
import path from "node:path";
import {
    PackageStore,
    loadConfig,
    probePythonEnvironment,
    setLogLevel,
    toIntegrity,
    type StashlinkConfig,
} from "@stashlink/core";
import { parseLanguage, runLink, runListLinks, runUnlink, runUnlinkPackage } from "./commands/link.js";
import { runList, runPut, runRemove, runShow, runVerify } from "./commands/store.js";
import { formatError } from "./utils/formatError.js";

interface GlobalOptions {
    store?: string;
    verbose?: boolean;
}

const program = new Command();

program
    .name("stashlink")
    .description("Content-addressed package store with native import linking")
    .option("-s, --store <dir>", "store root directory (default: $STASHLINK_STORE or ~/.stashlink/store)")
    .option("-v, --verbose", "verbose logging");

function setup(): { config: StashlinkConfig; store: PackageStore } {
    const options = program.opts<GlobalOptions>();
    const config = loadConfig();
    setLogLevel(options.verbose ? "verbose" : config.logLevel);
    const store = new PackageStore({ root: options.store ? path.resolve(options.store) : config.storeRoot });
    return { config, store };
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

program
    .command("put <dir>")
    .description("store a directory's files in the content-addressed store")
    .option("-m, --manifest <file>", "manifest file (default: <dir>/stashlink.json)")
    .option("-i, --ignore <pattern>", "extra ignore pattern (repeatable)", collect, [])
    .option("--no-freeze", "leave stored files writable")
    .action(async (dir: string, options: { manifest?: string; ignore: string[]; freeze: boolean }) => {
        const { store } = setup();
        const report = await runPut(store, dir, options);
        const status = report.alreadyStored ? "Already stored" : "Stored";
        console.log(chalk.green(`✓ ${status} ${report.files.length} file(s)`));
        if (options.freeze && !report.frozen) {
            console.log(chalk.yellow("⚠ Stored files were left writable"));
        }
        console.log(toIntegrity(report.hash));
    });

program
    .command("ls")
    .description("list stored packages")
    .action(async () => {
        const { store } = setup();
        const hashes = await runList(store);
        if (hashes.length === 0) {
            console.log("Store is empty");
            return;
        }
        for (const hash of hashes) {
            console.log(hash);
        }
    });

program
    .command("show <hash>")
    .description("show a stored package's location, manifest and files")
    .action(async (hash: string) => {
        const { store } = setup();
        const { pkg, files, manifest } = await runShow(store, hash);
        console.log(`Hash:     ${toIntegrity(pkg.hash)}`);
        console.log(`Files:    ${pkg.filesDir}`);
        console.log(`Manifest: ${JSON.stringify(manifest)}`);
        console.log(`\n${files.length} file(s):`);
        for (const file of files) {
            console.log(`  ${file}`);
        }
    });

program
    .command("verify <hash>")
    .description("recompute a stored package's hash and compare")
    .action(async (hash: string) => {
        const { store } = setup();
        const verified = await runVerify(store, hash);
        console.log(chalk.green(`✓ ${verified} is intact`));
    });

program
    .command("rm <hash>")
    .description("delete a package from the store")
    .action(async (hash: string) => {
        const { store } = setup();
        const removed = await runRemove(store, hash);
        console.log(chalk.green(`✓ Deleted ${removed}`));
    });

program
    .command("link <name> <hash>")
    .description("make a stored package importable in a project")
    .option("-l, --language <language>", "python or javascript", "python")
    .option("-p, --project <dir>", "project root", ".")
    .action(async (name: string, hash: string, options: { language: string; project: string }) => {
        const { config, store } = setup();
        const language = parseLanguage(options.language);
        const report = await runLink(store, {
            name,
            hash,
            language,
            projectRoot: options.project,
            probe: () => probePythonEnvironment({ interpreter: config.pythonInterpreter }),
        });

        console.log(chalk.green(`✓ Linked ${name} -> ${report.linkPath}`));
        if (report.graft) {
            console.log(chalk.green(`✓ Python path configured via ${report.graft.configFile}`));
            console.log(`  import: from stashlink.${path.basename(report.linkPath)} import ...`);
        }
        if (report.registerScript) {
            console.log(chalk.green(`✓ Wrote ${report.registerScript}`));
            console.log(`  preload: node --require ${path.relative(process.cwd(), report.registerScript)} app.js`);
            console.log(`  import: require('@stashlink/${name}')`);
        }
    });

program
    .command("links")
    .description("list packages linked into a project")
    .option("-p, --project <dir>", "project root", ".")
    .action(async (options: { project: string }) => {
        setup();
        const links = await runListLinks(options.project);
        if (links.length === 0) {
            console.log("No linked packages");
            return;
        }
        for (const link of links) {
            console.log(`${link.language.padEnd(10)} ${link.name} -> ${link.target}`);
        }
    });

program
    .command("unlink [name]")
    .description("remove one package link, or with no name all links and import configuration")
    .option("-l, --language <language>", "python or javascript (with a name)", "python")
    .option("-p, --project <dir>", "project root", ".")
    .action(async (name: string | undefined, options: { language: string; project: string }) => {
        setup();
        if (name !== undefined) {
            const removed = await runUnlinkPackage(options.project, name, parseLanguage(options.language));
            console.log(removed ? chalk.green(`✓ Unlinked ${name}`) : chalk.yellow(`⚠ ${name} was not linked`));
            return;
        }
        const report = await runUnlink(options.project);
        if (report.removedConfigFile) {
            console.log(chalk.green(`✓ Removed ${report.removedConfigFile}`));
        }
        if (report.removedRegisterScript) {
            console.log(chalk.green("✓ Removed Node.js register script"));
        }
        if (report.removedStashDir) {
            console.log(chalk.green("✓ Removed .stashlink/ directory"));
        } else {
            console.log("Nothing to remove");
        }
    });

try {
    await program.parseAsync(process.argv);
} catch (error) {
    for (const line of formatError(error)) {
        console.error(chalk.red(line));
    }
    process.exit(1);
}
