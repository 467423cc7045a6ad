/**
 * Deny-list of destructive command shapes.
 *
 * Patterns anchor on command position: start of input, after a separator or
 * a subshell opener, after a wrapper such as `sudo`/`env`, or inside a quoted
 * string handed to `sh -c`, `eval` or a `system(`-style call. The command name
 * may be path-qualified (`/bin/rm`) or backslash-escaped (`\rm`). Names end on
 * a token boundary, so `shutdown-notes.txt` does not match. All patterns are
 * case-insensitive.
 */

export interface DenyRule {
  id: string;
  description: string;
  pattern: RegExp;
}

const NAME_PREFIX = String.raw`(?:\\|[^\s;&|()'"\x60]*\/)?`;
const WRAPPERS = String.raw`(?:${NAME_PREFIX}(?:sudo|doas|env|nohup|exec|eval|time|command|nice|xargs)\s+(?:-\S*\s+|\w+=\S*\s+)*)*`;
const SEPARATOR = String.raw`[\n;&|({\x60]|\$\(`;
const QUOTED_COMMAND = String.raw`(?:\b(?:ba|da|k|z|fi)?sh\s+(?:-\w+\s+)*-\w*c\s+|\beval\s+|\b(?:system|popen|exec\w*|spawn\w*|call|run|check_call|check_output)\s*\(\s*\[?\s*)['"\x60]?`;
const COMMAND_START = String.raw`(?:^|(?<=${SEPARATOR}|${QUOTED_COMMAND}))\s*${WRAPPERS}${NAME_PREFIX}`;
const TOKEN_END = String.raw`(?=$|[\s;&|)}'"\x60])`;

// One shell statement, up to the next separator.
const ARGUMENTS = String.raw`[^;&|\n]*`;
const RECURSIVE_FLAG = String.raw`(?:-[a-z]*r[a-z]*|--recursive)`;
const HOME_TARGET = String.raw`(?:~\/?|\$\{?home\}?\/?|"\$\{?home\}?\/?")`;
const ROOT_TARGET = String.raw`(?:"?\/\*?"?|${HOME_TARGET})`;
const RECURSIVE_ON_ROOT = String.raw`(?=\s)(?=${ARGUMENTS}\s${RECURSIVE_FLAG}(?=\s|$))${ARGUMENTS}\s${ROOT_TARGET}${TOKEN_END}`;

function rule(id: string, description: string, source: string): DenyRule {
  return { id, description, pattern: new RegExp(source, 'i') };
}

export const DENY_RULES: readonly DenyRule[] = [
  rule(
    'recursive-root-delete',
    'Recursive deletion of the filesystem root or home directory',
    String.raw`${COMMAND_START}rm${RECURSIVE_ON_ROOT}`,
  ),
  rule(
    'disk-format',
    'Disk formatting or partitioning utility',
    String.raw`${COMMAND_START}(?:mkfs(?:\.\w+)?|mke2fs|mkswap|wipefs|fdisk|sfdisk|parted)${TOKEN_END}`,
  ),
  rule(
    'raw-device-write',
    'Raw write to a device with dd',
    String.raw`${COMMAND_START}dd\s${ARGUMENTS}\bof=\/dev\/(?!(?:null|zero|stdout|stderr)${TOKEN_END})\S+`,
  ),
  rule(
    'block-device-redirect',
    'Output redirected onto a block device',
    String.raw`>>?\s*\/dev\/(?:sd[a-z]|nvme\d|hd[a-z]|vd[a-z]|xvd[a-z]|mmcblk\d|disk\d)`,
  ),
  rule(
    'privilege-elevation',
    'Privilege elevation',
    String.raw`${COMMAND_START}(?:sudo|su|doas|pkexec)${TOKEN_END}`,
  ),
  rule(
    'shutdown-reboot',
    'System shutdown or reboot',
    String.raw`${COMMAND_START}(?:shutdown|reboot|halt|poweroff|init\s+[06]|systemctl\s+(?:poweroff|reboot|halt))${TOKEN_END}`,
  ),
  rule(
    'fork-bomb',
    'Fork bomb',
    String.raw`([a-z_]\w*|:)\s*\(\s*\)\s*\{\s*\1\s*\|\s*\1\s*&\s*\}\s*;\s*\1`,
  ),
  rule(
    'recursive-root-permissions',
    'Recursive ownership or permission change on the filesystem root or home directory',
    String.raw`${COMMAND_START}(?:chmod|chown|chgrp)${RECURSIVE_ON_ROOT}`,
  ),
];
