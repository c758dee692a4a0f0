export const SERVICE_TOKEN = "test-service-token";
export const BACKEND_URL = "http://backend.test";

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
