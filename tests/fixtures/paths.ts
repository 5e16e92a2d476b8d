import path from "path";
import { fileURLToPath } from "url";

const here = path.dirname(fileURLToPath(import.meta.url));

/** Path to a scenario shipped in the repository's scenarios/ directory */
export function scenarioPath(name: string): string {
  return path.join(here, "..", "..", "scenarios", name);
}

/** Path to a test fixture */
export function fixturePath(name: string): string {
  return path.join(here, name);
}
