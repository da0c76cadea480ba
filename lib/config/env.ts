import { config } from "dotenv";
import { resolve } from "path";

let loaded = false;

/**
 * Load .env.local first, then .env. Values already in process.env win.
 */
export function loadEnv(): void {
  if (loaded) return;
  config({ path: resolve(process.cwd(), ".env.local") });
  config({ path: resolve(process.cwd(), ".env") });
  loaded = true;
}
