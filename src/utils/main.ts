import path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * True when the module at `moduleUrl` is the script node/tsx was started
 * with, so CLI modules can also be imported by tests without running.
 */
export function isMain(moduleUrl: string) {
  const invoked = process.argv[1] ? path.resolve(process.argv[1]) : '';
  if (!invoked) return false;
  const thisFile = path.resolve(fileURLToPath(moduleUrl));
  return thisFile === invoked || thisFile.replace(/\.[cm]?[jt]s$/, '') === invoked.replace(/\.[cm]?[jt]s$/, '');
}
