import type { LogLevel } from "../core/ports/logger.js";

// ── ANSI ────────────────────────────────────────────────────────────────

const sgr =
  (...codes: string[]) =>
  (s: string): string =>
    `\x1b[${codes.join(";")}m${s}\x1b[0m`;

export const ansi = {
  bold: sgr("1"),
  dim: sgr("2"),
  red: sgr("31"),
  green: sgr("32"),
  yellow: sgr("33"),
  cyan: sgr("36"),
  gray: sgr("90"),
  white: sgr("97"),
  badge: (bg: "41" | "42" | "43" | "45" | "46", s: string): string =>
    sgr(bg, bg === "41" || bg === "45" ? "97" : "30")(` ${s} `),
} as const;

const { bold, dim, gray, green, red, white, yellow, cyan } = ansi;

const clock = (d = new Date()): string =>
  [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":") +
  `.${String(d.getMilliseconds()).padStart(3, "0")}`;

const LEVEL_BADGE: Record<LogLevel, string> = {
  debug: gray("DBG"),
  info: green("INF"),
  warn: yellow("WRN"),
  error: red("ERR"),
  fatal: ansi.badge("41", "FTL"),
};

const METHOD_BADGE: Record<string, string> = {
  GET: ansi.badge("42", "GET"),
  POST: ansi.badge("46", "POST"),
  PUT: ansi.badge("43", "PUT"),
  PATCH: ansi.badge("43", "PATCH"),
  DELETE: ansi.badge("41", "DEL"),
  OPTIONS: gray("OPT"),
};

const statusColor = (status: number): string => {
  const s = String(status);
  if (status < 300) return bold(green(s));
  if (status < 400) return bold(cyan(s));
  if (status < 500) return bold(yellow(s));
  return bold(red(s));
};

const durationColor = (ms: number): string => {
  if (ms < 50) return green(`${ms}ms`);
  if (ms < 200) return yellow(`${ms}ms`);
  return red(`${ms}ms`);
};

const formatMeta = (meta: Record<string, unknown>): string => {
  const parts = Object.entries(meta).map(([k, v]) => `${dim(`${k}=`)}${white(String(v))}`);
  return parts.length === 0 ? "" : ` ${parts.join(" ")}`;
};

/**
 * Pretty log line for the Logger.
 *
 *   INF 12:34:56.789 User created  userId=9b2f… role=gamer
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => `  ${LEVEL_BADGE[level]} ${dim(clock())} ${white(msg)}${formatMeta(meta)}\n`;

/**
 * HTTP access log line.
 *
 *   ← 12:34:56.789 GET 200 /api/v1/users 3.12ms  ip=127.0.0.1 rid=1c0a55e2
 */
export const formatAccessLog = (
  method: string,
  path: string,
  status: number,
  durationMs: number,
  ip: string,
  requestId: string,
): string => {
  const badge = METHOD_BADGE[method] ?? white(method);
  const meta = gray(`ip=${ip} rid=${requestId.slice(0, 8)}`);
  return `  ${dim("←")} ${dim(clock())} ${badge} ${statusColor(status)} ${white(path)} ${durationColor(durationMs)}  ${meta}\n`;
};

/**
 *   ✗ 12:34:56.789 CORS rejected  origin=https://evil.example
 */
export const formatCorsRejectLog = (origin: string): string =>
  `  ${red("✗")} ${dim(clock())} ${bold(red("CORS rejected"))}  ${dim("origin=")}${white(origin)}\n`;
