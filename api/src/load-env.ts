// api/src/load-env.ts - Load environment variables BEFORE any other imports
import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

const __dirname = dirname(fileURLToPath(import.meta.url));
const envPathFromSrc = join(__dirname, "..", ".env");
const envPathFromCwd = join(process.cwd(), ".env");

// Try next to the sources first, then cwd
let envResult = dotenv.config({ path: envPathFromSrc });
let loadedFrom = envPathFromSrc;
if (envResult.error) {
  envResult = dotenv.config({ path: envPathFromCwd });
  loadedFrom = envPathFromCwd;
}

console.log("[env] process.cwd() =", process.cwd());
console.log("[env] NODE_ENV =", process.env.NODE_ENV || "(not set)");
if (envResult.error) {
  console.log("[env] No .env file found, using process environment only");
} else {
  console.log("[env] Loaded .env from:", loadedFrom);
}
