// Preferred first: a one-item detail page, a one-item list page, a bare limit.
const CANDIDATE_QUERIES = ["ac=detail&pg=1&limit=1", "ac=list&pg=1&limit=1", "limit=1"] as const;

function appendQuery(baseUrl: string, query: string): string {
  const separator = baseUrl.includes("?") ? "&" : "?";
  return `${baseUrl}${separator}${query}`;
}

export function buildCandidateUrls(baseUrl: string): string[] {
  return [...CANDIDATE_QUERIES.map((query) => appendQuery(baseUrl, query)), baseUrl];
}
