import { homedir } from 'node:os';
import path from 'node:path';

/**
 * Root directory for runtime state (logs). Kept out of the repo.
 */
export function getBotHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.BOTLINE_HOME?.trim();
  if (override) return override;
  return path.join(homedir(), '.botline');
}
