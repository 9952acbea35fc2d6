import type { ProtocolError } from "@docclaims/core/errors";

/** JSON error response carrying the error's own HTTP status. */
export function errorResponse(err: ProtocolError): Response {
  return new Response(JSON.stringify(err.toJSON()), {
    status: err.code,
    headers: { "Content-Type": "application/json" },
  });
}

export function internalErrorResponse(): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 500,
        errorCode: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    }),
    { status: 500, headers: { "Content-Type": "application/json" } },
  );
}
