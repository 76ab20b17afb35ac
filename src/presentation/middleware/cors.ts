/**
 * CORS: origin check and preflight.
 */

const CORS_BASE: Readonly<Record<string, string>> = Object.freeze({
  "Access-Control-Allow-Methods": "GET, POST, PUT, PATCH, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization, X-Request-Id",
  "Access-Control-Max-Age": "86400",
  Vary: "Origin",
});

export const isOriginAllowed = (origins: readonly string[], origin: string): boolean =>
  origins.includes("*") || origins.includes(origin);

/**
 * Headers to merge into a response. Null when the origin is rejected;
 * empty when the request carries no Origin (not a CORS request).
 */
export const corsHeaders = (
  origins: readonly string[],
  requestOrigin: string | null,
): Record<string, string> | null => {
  if (requestOrigin === null) return {};
  if (!isOriginAllowed(origins, requestOrigin)) return null;
  return { ...CORS_BASE, "Access-Control-Allow-Origin": requestOrigin };
};

/** Returns a 204 preflight response or null if not a preflight */
export const handlePreflight = (origins: readonly string[], req: Request): Response | null => {
  if (req.method !== "OPTIONS") return null;

  const headers = corsHeaders(origins, req.headers.get("origin"));
  if (!headers) return new Response(null, { status: 403 });
  return new Response(null, { status: 204, headers });
};
