// String utility functions

/**
 * Lower-case key safe for storage lookups: "Ser Aldric-the Bold!" -> "ser_aldric_the_bold"
 */
export function slugify(name: string, fallback = 'character'): string {
  const slug = name
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || fallback;
}

/**
 * Normalize user input: trim and collapse whitespace
 */
export function normalizeInput(input: string): string {
  return input.trim().replace(/\s+/g, ' ');
}
