import type { OperationCategory } from "./types.js";

const EXACT: ReadonlyMap<string, OperationCategory> = new Map<string, OperationCategory>([
  ["fillRect", "draw"],
  ["strokeRect", "draw"],
  ["fillText", "draw"],
  ["strokeText", "draw"],
  ["drawImage", "draw"],
  ["getImageData", "read"],
  ["toDataURL", "read"],
  ["toBlob", "read"],
  ["measureText", "text"],
  ["getParameter", "parameter-query"],
  ["getSupportedExtensions", "extension-query"],
  ["getExtension", "extension-query"],
  ["getShaderPrecisionFormat", "shader-query"],
  ["drawArrays", "render"],
  ["drawElements", "render"],
]);

const QUERY_CATEGORIES: ReadonlySet<OperationCategory> = new Set<OperationCategory>([
  "parameter-query",
  "extension-query",
  "shader-query",
]);

/**
 * Map an API call name to its category. Exact names win; then instanced
 * draw calls, then anything naming a buffer or texture.
 */
export function categorize(operation: string): OperationCategory {
  const exact = EXACT.get(operation);
  if (exact !== undefined) return exact;
  if (/^draw(Arrays|Elements)Instanced/.test(operation)) return "render";
  if (operation.includes("Buffer")) return "buffer";
  if (operation.includes("Texture") || operation.startsWith("tex")) return "texture";
  return "other";
}

export function isQueryCategory(category: OperationCategory): boolean {
  return QUERY_CATEGORIES.has(category);
}
