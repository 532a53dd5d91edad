import {
  decodePermissions,
  formatPermissionReport,
  minimalPermissions,
} from '../libs/shared/src/utils/permissions.utils';

/**
 * Usage: decode-permissions [permission_integer]
 * Without an argument, prints the smallest integer the recording bot needs.
 */
export function run(argv: string[]): number {
  const input = argv[0];

  if (!input) {
    const minimal = minimalPermissions();
    console.log(`Minimal permission integer for the recording bot: ${minimal}`);
    console.log(formatPermissionReport(decodePermissions(minimal)));
    return 0;
  }

  try {
    console.log(formatPermissionReport(decodePermissions(input)));
    return 0;
  } catch (e) {
    console.error(`[decode-permissions] ${(e as Error).message}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
