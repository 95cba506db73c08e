/**
 * WebGL enum values used by parameter spoofing and usage detection.
 */
export const GL = {
  VENDOR: 0x1f00,
  RENDERER: 0x1f01,
  VERSION: 0x1f02,
  SHADING_LANGUAGE_VERSION: 0x8b8c,
  UNMASKED_VENDOR_WEBGL: 0x9245,
  UNMASKED_RENDERER_WEBGL: 0x9246,

  MAX_TEXTURE_SIZE: 0x0d33,
  MAX_VIEWPORT_DIMS: 0x0d3a,
  MAX_CUBE_MAP_TEXTURE_SIZE: 0x851c,
  MAX_RENDERBUFFER_SIZE: 0x84e8,
  MAX_VERTEX_ATTRIBS: 0x8869,
  MAX_VERTEX_UNIFORM_VECTORS: 0x8dfb,
  MAX_VARYING_VECTORS: 0x8dfc,
  MAX_FRAGMENT_UNIFORM_VECTORS: 0x8dfd,
  MAX_TEXTURE_IMAGE_UNITS: 0x8872,
  MAX_VERTEX_TEXTURE_IMAGE_UNITS: 0x8b4c,
  MAX_COMBINED_TEXTURE_IMAGE_UNITS: 0x8b4d,
  ALIASED_POINT_SIZE_RANGE: 0x846d,
  ALIASED_LINE_WIDTH_RANGE: 0x846e,

  FRAGMENT_SHADER: 0x8b30,
  VERTEX_SHADER: 0x8b31,
  LOW_FLOAT: 0x8df0,
  MEDIUM_FLOAT: 0x8df1,
  HIGH_FLOAT: 0x8df2,
  LOW_INT: 0x8df3,
  MEDIUM_INT: 0x8df4,
  HIGH_INT: 0x8df5,

  ALPHA: 0x1906,
  RGB: 0x1907,
  RGBA: 0x1908,
  LUMINANCE: 0x1909,
  LUMINANCE_ALPHA: 0x190a,
} as const;

export type GLParameterName = keyof typeof GL;

const NAMES_BY_VALUE = new Map<number, GLParameterName>();
for (const [name, value] of Object.entries(GL)) {
  if (isGLParameterName(name)) NAMES_BY_VALUE.set(value, name);
}

export function isGLParameterName(name: string): name is GLParameterName {
  return Object.prototype.hasOwnProperty.call(GL, name);
}

/**
 * Normalise a GL parameter to its symbolic name. Accepts numbers, decimal
 * strings (`"7936"`), hex strings in either case (`"0x1F00"`, `"0x1f00"`)
 * and names. Unknown numbers become upper-case hex; unknown strings are
 * returned trimmed.
 */
export function glParameterName(parameter: string | number): string {
  if (typeof parameter === "number") {
    return NAMES_BY_VALUE.get(parameter) ?? `0x${parameter.toString(16).toUpperCase()}`;
  }
  const trimmed = parameter.trim();
  const value = parseGLEnum(trimmed);
  return (value === undefined ? undefined : NAMES_BY_VALUE.get(value)) ?? trimmed;
}

/** Numeric value of a GL parameter given in any of the forms `glParameterName` accepts. */
export function glEnumValue(parameter: string | number): number | undefined {
  if (typeof parameter === "number") return parameter;
  const trimmed = parameter.trim();
  return isGLParameterName(trimmed) ? GL[trimmed] : parseGLEnum(trimmed);
}

function parseGLEnum(text: string): number | undefined {
  if (/^0x[0-9a-f]+$/i.test(text)) return Number.parseInt(text.slice(2), 16);
  if (/^\d+$/.test(text)) return Number.parseInt(text, 10);
  return undefined;
}
