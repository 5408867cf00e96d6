/** Identifier embedded in a resource path. */
export type TResourceId = string | number

export function resourcePath(basePath: string, id: TResourceId): string {
  return `${basePath}/${encodeURIComponent(String(id))}`
}
