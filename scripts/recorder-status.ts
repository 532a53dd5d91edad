import { join } from 'path';
import { IPC_DIR, STATUS_FILE } from './utils/env-loader';
import { readStatusFile } from '../libs/shared/src/utils/status.utils';

export function run(statusPath: string = join(IPC_DIR, STATUS_FILE)): number {
  const status = readStatusFile(statusPath);
  if (!status) {
    console.error(`[recorder-status] No usable status at ${statusPath}`);
    return 1;
  }
  console.log(JSON.stringify(status, null, 2));
  return 0;
}

if (require.main === module) {
  process.exitCode = run();
}
