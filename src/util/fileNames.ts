const RESERVED = /[%@\\/:*?"<>|\x00-\x1f]/g;

const escapeChar = (char: string): string => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`;

/**
 * Turns a name into a single path segment. `%` is escaped too, so distinct
 * names always map to distinct segments.
 */
export const encodeFileName = (value: string): string => {
  const encoded = value.replace(RESERVED, escapeChar);
  return encoded === '.' || encoded === '..' ? encoded.replace(/\./g, escapeChar) : encoded;
};
