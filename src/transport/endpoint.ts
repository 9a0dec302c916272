/**
 * URL for `path` under an endpoint, keeping any path prefix the endpoint carries
 * (`http://gateway/peer-2` + `/mutex/request` → `http://gateway/peer-2/mutex/request`)
 */
export function resolveEndpoint(endpoint: string, path: string): string {
  const base = endpoint.endsWith('/') ? endpoint : `${endpoint}/`
  return new URL(path.replace(/^\/+/, ''), base).toString()
}
