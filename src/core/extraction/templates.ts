// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TEMPLATES — One Named Field per Regex
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every template is compiled case-insensitive with dotAll, so a field may
// start on the line after its heading.
//
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractionTemplate {
  /** Name of the capture group holding the value */
  readonly field: string;
  readonly pattern: RegExp;
  /** Shown to the user when the pattern finds nothing */
  readonly label: string;
}

export const TEMPLATE_FLAGS = 'is';

/**
 * Throws a TypeError when `source` has no `(?<field>...)` group.
 */
export function compileTemplate(field: string, source: string, label: string): ExtractionTemplate {
  if (!source.includes(`(?<${field}>`)) {
    throw new TypeError(`Extraction pattern for "${field}" has no named group "${field}"`);
  }
  return Object.freeze({
    field,
    pattern: new RegExp(source, TEMPLATE_FLAGS),
    label,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// BUILT-IN TEMPLATES
// ─────────────────────────────────────────────────────────────────────────────────

export const POLAR_RADIUS_TEMPLATE = compileTemplate(
  'radius',
  String.raw`(?:Polar radius.*?)(?: ?[\d]+ )?(?<radius>[\d,.]+)(?:.*?)km`,
  'Page infobox has no polar radius information'
);

export const BIRTH_DATE_TEMPLATE = compileTemplate(
  'birth',
  String.raw`(?:Born\D*)(?<birth>\d{4}-\d{2}-\d{2})`,
  'Page infobox has no birth information (at least none in xxxx-xx-xx format)'
);

// The citation run after the year must not swallow `]`, otherwise the leading
// digits of "[3])2,048,472" are eaten as part of the reference marker.
export const POPULATION_TEMPLATE = compileTemplate(
  'population',
  String.raw`Population\D*\d{4}[)\[\d]*\D*(?<population>[\d,]+)`,
  'Page infobox has no population information'
);

export const ESTABLISHED_TEMPLATE = compileTemplate(
  'established',
  String.raw`Established[\n\s]*(?<established>[\d\w\s,]+)[;\(]+`,
  "Page infobox has no establishment information (at least not in the 'established' format)"
);

export const UNDERGRADUATES_TEMPLATE = compileTemplate(
  'undergraduates',
  String.raw`Undergraduates[\n\s]*(?<undergraduates>[\d,]+)`,
  'Page infobox has no information on undergraduate population'
);
