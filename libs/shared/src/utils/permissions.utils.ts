import { PermissionsBitField, PermissionsString } from 'discord.js';

export const REQUIRED_PERMISSIONS: readonly PermissionsString[] = [
  'ViewChannel',
  'Connect',
  'Speak',
  'UseVAD',
  'ReadMessageHistory',
];

export const DANGEROUS_PERMISSIONS: readonly PermissionsString[] = [
  'Administrator',
  'ManageGuild',
  'BanMembers',
  'KickMembers',
  'ManageRoles',
  'ManageChannels',
];

export interface PermissionAnalysis {
  value: bigint;
  hex: string;
  granted: PermissionsString[];
  missingRequired: PermissionsString[];
  dangerousGranted: PermissionsString[];
  isAdmin: boolean;
}

function toBigInt(input: string | bigint): bigint {
  if (typeof input === 'bigint') {
    if (input < 0n) throw new Error('Permission value must be a non-negative integer');
    return input;
  }
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid permission value: "${input}"`);
  }
  return BigInt(trimmed);
}

export function decodePermissions(input: string | bigint): PermissionAnalysis {
  const value = toBigInt(input);
  const bits = new PermissionsBitField(value);
  const granted = bits.toArray().sort();

  return {
    value,
    hex: `0x${value.toString(16)}`,
    granted,
    // has() treats Administrator as implying every flag unless told not to
    missingRequired: REQUIRED_PERMISSIONS.filter((p) => !bits.has(p, false)),
    dangerousGranted: DANGEROUS_PERMISSIONS.filter((p) => bits.has(p, false)),
    isAdmin: bits.has('Administrator', false),
  };
}

export function minimalPermissions(): bigint {
  return PermissionsBitField.resolve([...REQUIRED_PERMISSIONS]);
}

export function formatPermissionReport(analysis: PermissionAnalysis): string {
  const lines: string[] = [
    'DISCORD BOT PERMISSION ANALYSIS',
    '',
    `Permission Integer: ${analysis.value}`,
    `Permission Hex: ${analysis.hex}`,
    `Total Permissions: ${analysis.granted.length}`,
    `Administrator: ${analysis.isAdmin ? 'YES - DANGEROUS!' : 'No'}`,
    '',
    'REQUIRED PERMISSIONS:',
  ];

  for (const perm of REQUIRED_PERMISSIONS) {
    const state = analysis.missingRequired.includes(perm) ? 'MISSING' : 'granted';
    lines.push(`  ${perm.padEnd(20)} ${state}`);
  }

  if (analysis.dangerousGranted.length > 0) {
    lines.push('', 'DANGEROUS PERMISSIONS GRANTED:');
    for (const perm of analysis.dangerousGranted) {
      lines.push(`  - ${perm}`);
    }
  }

  lines.push('', 'ALL GRANTED PERMISSIONS:');
  analysis.granted.forEach((perm, i) => {
    lines.push(`  ${String(i + 1).padStart(2)}. ${perm}`);
  });

  return lines.join('\n');
}
