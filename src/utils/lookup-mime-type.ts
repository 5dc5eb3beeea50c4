import { lookup } from 'mime-types';

export const DIRECTORY_MIME_TYPE = 'inode/directory';

/**
 * Guess a content type from a file extension, given without the leading dot.
 * @returns The content type, or null when the extension is unknown or empty
 */
export const lookupMimeType = (extension: string): string | null => {
  if (extension === '') {
    return null;
  }
  const result = lookup(extension);
  return result === false ? null : result;
};
