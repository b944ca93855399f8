import * as os from 'node:os';
import * as path from 'node:path';

export const CREATED_FILES_FILENAME = 'created_files.yml';
export const SETUP_FILENAME = 'setup.yml';
export const COMPILED_DIRNAME = 'compiled';
export const PID_FILENAME = 'solstice.pid';

/**
 * Directory holding persisted state:
 * $SOLSTICE_STATE_DIR, else $XDG_DATA_HOME/solstice, else ~/.local/share/solstice.
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env['SOLSTICE_STATE_DIR'];
  if (explicit) return path.resolve(explicit);

  const dataHome = env['XDG_DATA_HOME'];
  if (dataHome) return path.join(dataHome, 'solstice');

  return path.join(os.homedir(), '.local', 'share', 'solstice');
}
