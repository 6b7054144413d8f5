/**
 * Normalize a Python distribution name so that spellings pip treats as the
 * same package compare equal.
 *
 * Examples:
 *   Flask_SQLAlchemy -> flask-sqlalchemy
 *   zope.interface   -> zope-interface
 *   typing__extensions -> typing-extensions
 */
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Build the matrix entry id for an OS label and interpreter version.
 * The id doubles as a path suffix, so it carries no separators.
 */
export function matrixEntryId(os: string, python: string): string {
  return `${os}-py${python}`.replace(/[^A-Za-z0-9.-]/g, '_');
}
