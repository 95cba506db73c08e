import { GL, glParameterName, type WebGLConfig } from '@veilprint/core';

import type { ShaderPrecisionFormat, WebGLParameterValue } from './types.js';

/** Extensions that expose the real GPU or precise timing and are always hidden. */
export const HIDDEN_EXTENSIONS: readonly string[] = [
  'WEBGL_debug_renderer_info',
  'WEBGL_debug_shaders',
  'EXT_disjoint_timer_query',
];

/** Extension list advertised when the binding has no native list to filter. */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  'ANGLE_instanced_arrays',
  'EXT_blend_minmax',
  'EXT_frag_depth',
  'EXT_shader_texture_lod',
  'EXT_texture_filter_anisotropic',
  'EXT_sRGB',
  'OES_element_index_uint',
  'OES_standard_derivatives',
  'OES_texture_float',
  'OES_texture_half_float',
  'OES_vertex_array_object',
  'WEBGL_color_buffer_float',
  'WEBGL_compressed_texture_s3tc',
  'WEBGL_depth_texture',
  'WEBGL_draw_buffers',
  'WEBGL_lose_context',
];

/** Reported values for numeric limits unless `webgl.parameters` overrides them. */
export const DEFAULT_LIMITS: Readonly<Record<string, number>> = {
  MAX_TEXTURE_SIZE: 16384,
  MAX_CUBE_MAP_TEXTURE_SIZE: 16384,
  MAX_RENDERBUFFER_SIZE: 16384,
  MAX_VERTEX_ATTRIBS: 16,
  MAX_VERTEX_UNIFORM_VECTORS: 1024,
  MAX_FRAGMENT_UNIFORM_VECTORS: 1024,
  MAX_VARYING_VECTORS: 30,
};

export const DEFAULT_VIEWPORT_DIMS = 16384;

const FLOAT_PRECISIONS = new Set<number>([GL.LOW_FLOAT, GL.MEDIUM_FLOAT, GL.HIGH_FLOAT]);
const INT_PRECISIONS = new Set<number>([GL.LOW_INT, GL.MEDIUM_INT, GL.HIGH_INT]);

const BYTES_PER_PIXEL = new Map<number, number>([
  [GL.RGB, 3],
  [GL.RGBA, 4],
  [GL.LUMINANCE, 1],
  [GL.ALPHA, 1],
  [GL.LUMINANCE_ALPHA, 2],
]);

function parseLimit(text: string | undefined): number | undefined {
  if (text === undefined || !/^\s*\d+\s*$/.test(text)) return undefined;
  return Number.parseInt(text, 10);
}

/**
 * The string reported for VENDOR, RENDERER, VERSION and
 * SHADING_LANGUAGE_VERSION (and the unmasked debug variants), or
 * `undefined` for any other parameter.
 */
export function spoofedStringParameter(config: WebGLConfig, parameter: string | number): string | undefined {
  switch (glParameterName(parameter)) {
    case 'VENDOR':
    case 'UNMASKED_VENDOR_WEBGL':
      return config.vendor;
    case 'RENDERER':
    case 'UNMASKED_RENDERER_WEBGL':
      return config.renderer;
    case 'VERSION':
      return config.version;
    case 'SHADING_LANGUAGE_VERSION':
      return config.shadingLanguageVersion;
    default:
      return undefined;
  }
}

/**
 * The value reported for a spoofed parameter, or `undefined` when the
 * parameter is not one the engine controls. Numeric limits honour
 * integer overrides in `config.parameters`; malformed overrides fall back
 * to the defaults.
 */
export function spoofedParameter(config: WebGLConfig, parameter: string | number): WebGLParameterValue | undefined {
  const text = spoofedStringParameter(config, parameter);
  if (text !== undefined) return text;

  const name = glParameterName(parameter);
  if (name === 'MAX_VIEWPORT_DIMS') {
    const dims = parseLimit(config.parameters[name]) ?? DEFAULT_VIEWPORT_DIMS;
    return new Int32Array([dims, dims]);
  }
  if (!Object.prototype.hasOwnProperty.call(DEFAULT_LIMITS, name)) return undefined;
  return parseLimit(config.parameters[name]) ?? DEFAULT_LIMITS[name];
}

/**
 * Drop hidden extensions from `native`, then append configured extensions
 * that are not already present. Order is preserved.
 */
export function filterExtensions(config: WebGLConfig, native: readonly string[]): string[] {
  const hidden = new Set(HIDDEN_EXTENSIONS);
  const result = native.filter((ext) => !hidden.has(ext));
  const seen = new Set(result);
  for (const ext of config.extensions) {
    if (!seen.has(ext)) {
      seen.add(ext);
      result.push(ext);
    }
  }
  return result;
}

/** Fixed precision format: IEEE single for float types, 32-bit for int types. */
export function shaderPrecisionFormat(precisionType: number): ShaderPrecisionFormat {
  if (FLOAT_PRECISIONS.has(precisionType)) return { rangeMin: 127, rangeMax: 127, precision: 23 };
  if (INT_PRECISIONS.has(precisionType)) return { rangeMin: 31, rangeMax: 30, precision: 0 };
  return { rangeMin: 0, rangeMax: 0, precision: 0 };
}

/** Bytes per pixel for an unsigned-byte texture format, or `undefined` for unsupported formats. */
export function textureBytesPerPixel(format: number): number | undefined {
  return BYTES_PER_PIXEL.get(format);
}
