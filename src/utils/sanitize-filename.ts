/**
 * Map arbitrary text to a filesystem-safe token
 * Anything but letters, digits, "_", "-" and "." becomes "_", then runs of "_" collapse
 *
 * @example
 * sanitizeFilename("Paschim Champaran") // "Paschim_Champaran"
 * sanitizeFilename("A / B") // "A_B"
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^\p{L}\p{N}_.-]/gu, "_").replace(/_+/g, "_");
}
