import type { HealthService } from "../../application/services/health.service.js";

/**
 * Two probes:
 * - shallow (/health): process is up, no I/O
 * - deep (/readiness): database round trip, 503 when it fails
 */
export const healthHandler = (healthService: HealthService) => {
  const shallowHeaders = { "Content-Type": "application/json; charset=utf-8" };

  const shallowCheck = (): Response => {
    const body = `{"data":{"status":"ok","uptime":${process.uptime()}}}`;
    return new Response(body, { status: 200, headers: shallowHeaders });
  };

  const deepCheck = async (): Promise<Response> => {
    const status = await healthService.check();
    return Response.json({ data: status }, { status: status.status === "ok" ? 200 : 503 });
  };

  return { shallowCheck, deepCheck };
};
