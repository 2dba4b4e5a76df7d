import { existsSync } from "node:fs";
import path from "node:path";
import {
  backupControlPlaneDatabase,
  getControlPlaneDatabase,
  resolveDataDir,
  resolveDbPath,
  restoreControlPlaneDatabase
} from "../database.js";

function timestamp(): string {
  return new Date().toISOString().replaceAll(":", "-");
}

function usage(): never {
  throw new Error("Usage: npm run db -- init | backup [targetPath] | restore <backupPath>");
}

async function run(): Promise<void> {
  const command = process.argv[2];
  const argPath = process.argv[3];
  const dbPath = resolveDbPath();

  if (command === "init") {
    getControlPlaneDatabase();
    // eslint-disable-next-line no-console
    console.log(`Database ready: ${dbPath} (benchmark_runs, evaluation_results, performance_cache)`);
    return;
  }

  if (command === "backup") {
    if (!existsSync(dbPath)) {
      throw new Error(`Control-plane DB not found: ${dbPath}`);
    }
    const target = argPath ?? path.join(resolveDataDir(), "backups", `control-plane-${timestamp()}.db`);
    await backupControlPlaneDatabase(getControlPlaneDatabase(), target);
    // eslint-disable-next-line no-console
    console.log(`Backup created: ${target}`);
    return;
  }

  if (command === "restore") {
    if (!argPath) usage();
    restoreControlPlaneDatabase(argPath, dbPath);
    // eslint-disable-next-line no-console
    console.log(`DB restored from: ${argPath}`);
    return;
  }

  usage();
}

run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
