/**
 * Resource ID extraction for Google Drive links
 */

// Tried in order; the first capture wins
const RESOURCE_ID_PATTERNS: readonly RegExp[] = [
  /id=([a-zA-Z0-9_-]+)/, // https://drive.google.com/open?id=FILE_ID
  /\/d\/([a-zA-Z0-9_-]+)/, // https://drive.google.com/file/d/FILE_ID/view
];

/**
 * Extract the Drive file ID embedded in a reference string
 *
 * @returns The file ID, or null when the reference is empty or unrecognized
 *
 * @example
 * extractResourceId("https://host/open?id=ABC123") // "ABC123"
 * extractResourceId("https://host/file/d/XYZ_9-8/view") // "XYZ_9-8"
 * extractResourceId("not a link") // null
 */
export function extractResourceId(reference: string): string | null {
  if (reference.trim() === "") {
    return null;
  }

  for (const pattern of RESOURCE_ID_PATTERNS) {
    const match = reference.match(pattern);
    if (match) {
      return match[1];
    }
  }

  return null;
}
