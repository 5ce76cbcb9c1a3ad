/**
 * Resolves a path inside `public/` against the app's base URL, so the data
 * file is found whether the app is served from `/` or a sub-path.
 */
export function publicUrl(
  path: string,
  baseUrl: string = import.meta.env.BASE_URL,
): string {
  const normalizedBaseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;

  return `${normalizedBaseUrl}${path.replace(/^\/+/, "")}`;
}

export function formatRating(rating: number): string {
  return rating.toFixed(2);
}
