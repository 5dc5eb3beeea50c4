const PERMISSIONS_PATTERN = /^(?:0o?)?([0-7]{1,4})$/i;

/**
 * Parse permission bits written in octal.
 * Supports formats like: "755", "0755", "0o755"
 * @returns The mode as a number, or undefined if the value is not an octal mode
 */
export const parsePermissions = (value: string): number | undefined => {
  const match = value.trim().match(PERMISSIONS_PATTERN);
  if (!match) {
    return undefined;
  }

  return Number.parseInt(match[1] ?? '', 8);
};

export const formatPermissions = (mode: number) => `0o${mode.toString(8).padStart(3, '0')}`;
