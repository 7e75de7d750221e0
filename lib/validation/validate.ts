import { NextRequest, NextResponse } from "next/server";
import type { z } from "zod";

export interface Validated<T> {
  data: T;
}

/**
 * Parses the request's query string with `schema`. On failure returns a
 * ready 422 response whose `detail` joins the issue messages.
 */
export function validateQuery<S extends z.ZodTypeAny>(
  schema: S,
  request: NextRequest,
): Validated<z.infer<S>> | NextResponse {
  const query = Object.fromEntries(request.nextUrl.searchParams);
  const result = schema.safeParse(query);
  if (result.success) {
    return { data: result.data };
  }
  const detail = result.error.issues.map((issue) => issue.message).join("; ");
  return NextResponse.json({ detail }, { status: 422 });
}

export function isValidationError<T>(
  result: Validated<T> | NextResponse,
): result is NextResponse {
  return result instanceof NextResponse;
}
