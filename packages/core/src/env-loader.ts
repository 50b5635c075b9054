// Shared environment loader for cloudbulk
//
// MUST be imported BEFORE any other modules that read environment variables.
// This module is idempotent - safe to import multiple times.
//
// Walks up from the working directory to the nearest .env (or .env.example)
// and loads .env with override: false, so variables already exported in the
// shell win. Skipped under test runners, which set their own environment.

/**
 * Information about which environment sources were loaded
 */
export const envLoadInfo: { envLoaded: boolean; envPath: string | null } = {
  envLoaded: false,
  envPath: null,
};

// Track if we've already loaded to make this idempotent
let loaded = false;

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

if (!isTest && !loaded) {
  loaded = true;

  const dotenv = await import("dotenv");
  const path = await import("node:path");
  const fs = await import("node:fs");

  let rootDir = process.cwd();

  // Walk up the directory tree to find the project root
  let dir = rootDir;
  for (let i = 0; i < 10; i++) {
    const envPath = path.join(dir, ".env");
    const examplePath = path.join(dir, ".env.example");
    if (fs.existsSync(envPath) || fs.existsSync(examplePath)) {
      rootDir = dir;
      break;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break; // Reached filesystem root
    dir = parent;
  }

  const envPath = path.join(rootDir, ".env");

  if (fs.existsSync(envPath)) {
    dotenv.config({
      path: envPath,
      override: false,
    });
    envLoadInfo.envLoaded = true;
    envLoadInfo.envPath = envPath;
  }
}

