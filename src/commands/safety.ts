/**
 * Safety gate — classifies shell invocations against a deny list.
 *
 * Matching is a case-insensitive substring test over the whole command
 * string with whitespace runs collapsed, so multi-word phrases
 * (`chmod 777`) and commands buried after a pipe or `&&` are caught too.
 */

/**
 * Destructive or administrative operations. Short entries carry their
 * argument separator (`rm `, `dd if=`) to keep matches on the command word.
 */
export const DEFAULT_DENY_LIST: readonly string[] = [
  // removal
  'rm ',
  'rmdir',
  'del /',
  'unlink ',
  // formatting / raw disk
  'format ',
  'fdisk',
  'mkfs',
  'dd if=',
  'parted',
  // privilege escalation
  'sudo',
  'su -',
  'su root',
  'doas ',
  'passwd',
  // permissions / ownership
  'chmod',
  'chown',
  'chgrp',
  // services / processes
  'systemctl',
  'service ',
  'kill',
  'shutdown',
  'reboot',
  'halt',
  'poweroff',
  'init 0',
  'init 6',
  'mount',
  'crontab',
  // firewall / network
  'iptables',
  'ufw ',
  'ifconfig',
  'ip link',
  'route ',
  // history / log erasure
  'history -c',
  '> /var/log',
  '/dev/sda',
  // secure wipe
  'shred',
  'wipe',
  'srm ',
];

/**
 * Lower-case, collapse whitespace runs to one space, and end with a space,
 * so `rm\t-rf` and a trailing `xargs rm` meet the `rm ` entry.
 */
function normalize(text: string): string {
  return `${text.toLowerCase().replace(/\s+/g, ' ').trim()} `;
}

function matchesEntry(normalized: string, entry: string): boolean {
  const needle = entry.toLowerCase().replace(/\s+/g, ' ');
  return needle.trim().length > 0 && normalized.includes(needle);
}

/**
 * True when no deny-list entry occurs in the normalized command.
 * Blank commands are never safe.
 */
export function isSafeCommand(
  parsedCommand: string,
  denyList: readonly string[] = DEFAULT_DENY_LIST,
): boolean {
  if (parsedCommand.trim().length === 0) return false;
  const normalized = normalize(parsedCommand);
  return !denyList.some((entry) => matchesEntry(normalized, entry));
}

/** Return every deny-list entry that matched, for reporting. */
export function findDeniedPatterns(
  parsedCommand: string,
  denyList: readonly string[] = DEFAULT_DENY_LIST,
): string[] {
  const normalized = normalize(parsedCommand);
  return denyList.filter((entry) => matchesEntry(normalized, entry));
}
