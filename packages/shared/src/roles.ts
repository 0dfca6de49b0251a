/**
 * Connection roles.
 *
 * A role is a two-bit capability set: Reader receives events, Writer sends
 * pairings. ReadWriter is both, None is neither.
 */

export const ConnectionRole = {
  None: 0,
  Reader: 1,
  Writer: 2,
  ReadWriter: 3,
} as const;

export type ConnectionRole = (typeof ConnectionRole)[keyof typeof ConnectionRole];

export const ROLE_NAMES = ['none', 'reader', 'writer', 'readwriter'] as const;

export type RoleName = (typeof ROLE_NAMES)[number];

const ROLE_BY_NAME: Record<RoleName, ConnectionRole> = {
  none: ConnectionRole.None,
  reader: ConnectionRole.Reader,
  writer: ConnectionRole.Writer,
  readwriter: ConnectionRole.ReadWriter,
};

export function canRead(role: ConnectionRole): boolean {
  return (role & ConnectionRole.Reader) !== 0;
}

export function canWrite(role: ConnectionRole): boolean {
  return (role & ConnectionRole.Writer) !== 0;
}

function isRoleName(value: string): value is RoleName {
  return (ROLE_NAMES as readonly string[]).includes(value);
}

/**
 * Parse a role from its wire form: a name (case-insensitive) or 0-3.
 * Returns null for anything else.
 */
export function parseRole(input: unknown): ConnectionRole | null {
  if (typeof input === 'number') {
    switch (input) {
      case 0:
        return ConnectionRole.None;
      case 1:
        return ConnectionRole.Reader;
      case 2:
        return ConnectionRole.Writer;
      case 3:
        return ConnectionRole.ReadWriter;
      default:
        return null;
    }
  }
  if (typeof input === 'string') {
    const name = input.trim().toLowerCase();
    return isRoleName(name) ? ROLE_BY_NAME[name] : null;
  }
  return null;
}

export function roleName(role: ConnectionRole): RoleName {
  return ROLE_NAMES[role];
}
