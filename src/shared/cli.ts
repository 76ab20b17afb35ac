import { networkInterfaces } from "node:os";
import type { AppConfig } from "../infrastructure/config/config.js";
import { ansi } from "./log-format.js";

const { bold, dim, gray, green, cyan, red, white, yellow } = ansi;

const ENV_BADGE: Record<AppConfig["env"], string> = {
  production: ansi.badge("42", "PRODUCTION"),
  development: ansi.badge("46", "DEVELOPMENT"),
  test: ansi.badge("43", "TEST"),
};

const methodColor = (method: string): string => {
  const padded = bold(method.padEnd(7));
  switch (method) {
    case "GET":
      return green(padded);
    case "POST":
      return cyan(padded);
    case "PUT":
    case "PATCH":
      return yellow(padded);
    case "DELETE":
      return red(padded);
    default:
      return white(padded);
  }
};

interface RouteInfo {
  readonly method: string;
  readonly path: string;
  readonly description: string;
}

const routes: readonly RouteInfo[] = [
  { method: "GET", path: "/health", description: "Liveness" },
  { method: "GET", path: "/readiness", description: "Readiness (database ping)" },
  { method: "POST", path: "/api/v1/auth/login", description: "Check credentials" },
  { method: "POST", path: "/api/v1/users", description: "Create user" },
  { method: "GET", path: "/api/v1/users", description: "List users" },
  { method: "GET", path: "/api/v1/users/lookup", description: "Find user by email" },
  { method: "GET", path: "/api/v1/users/:id", description: "Get user" },
  { method: "PUT", path: "/api/v1/users/:id", description: "Update profile" },
  { method: "DELETE", path: "/api/v1/users/:id", description: "Deactivate user" },
  { method: "PATCH", path: "/api/v1/users/:id/status", description: "Change status" },
];

const firstExternalIPv4 = (): string => {
  for (const addrs of Object.values(networkInterfaces())) {
    for (const addr of addrs ?? []) {
      if (addr.family === "IPv4" && !addr.internal) return addr.address;
    }
  }
  return "0.0.0.0";
};

interface StartupInfo {
  readonly config: AppConfig;
  readonly version: string;
  readonly port: number;
  readonly bootTimeMs: number;
  readonly storage: "postgres" | "memory";
}

/** Startup banner; printed once the server is listening */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, port } = info;
  const boot =
    info.bootTimeMs < 1000
      ? `${Math.round(info.bootTimeMs)}ms`
      : `${(info.bootTimeMs / 1000).toFixed(2)}s`;

  const lines: string[] = [
    "",
    `  ${bold(white("Marketplace User API"))} ${dim(`v${info.version}`)}`,
    "",
    `  ${ENV_BADGE[config.env]}  ${dim("booted in")} ${bold(green(boot))}`,
    "",
    `  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(`http://localhost:${port}`))}`,
  ];
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(`http://${firstExternalIPv4()}:${port}`))}`);
  }
  lines.push(
    "",
    `  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`,
    `  ${gray("├─")} ${dim("Runtime")}       ${white(`Node.js ${process.versions.node}`)}`,
    `  ${gray("├─")} ${dim("Storage")}       ${info.storage === "postgres" ? green("postgres") : yellow("in-memory")}`,
    `  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`,
    "",
    `  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`,
    `  ${gray("─".repeat(64))}`,
  );
  for (const route of routes) {
    lines.push(`  ${methodColor(route.method)} ${route.path.padEnd(28)} ${dim(route.description)}`);
  }
  lines.push(`  ${gray("─".repeat(64))}`, "", `  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`, "");

  process.stdout.write(`${lines.join("\n")}\n`);
};

export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down gracefully…")}\n\n`,
  );
};

/** One line per offending field, then a hint; written to stderr */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const lines: string[] = ["", `  ${ansi.badge("45", "CONFIG ERROR")}  ${dim("Invalid configuration")}`, ""];

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("", `  ${dim("Check the environment variables listed in .env.example")}`, "");
  process.stderr.write(`${lines.join("\n")}\n`);
};
