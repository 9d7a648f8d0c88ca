// src/lib/aliases/http.ts
import { NextResponse } from 'next/server';
import { z } from 'zod';
import type { BatchError, BatchErrorKind } from './errors';

const STATUS_BY_KIND: Record<BatchErrorKind, number> = {
  NothingToAdd: 200, // informational, not a failure
  EmptySelection: 422,
  PrimaryProtected: 422,
  EmptyPrincipal: 400,
  ProductNotFound: 404,
  SeedFailed: 502,
};

export function statusFor(error: BatchError): number {
  return STATUS_BY_KIND[error.kind];
}

export function rejected(error: BatchError) {
  return NextResponse.json({ outcome: { status: 'rejected', error } }, { status: statusFor(error) });
}

export function badRequest(message: string, details?: z.ZodIssue[]) {
  return NextResponse.json({ error: message, details }, { status: 400 });
}

export function internalError(where: string, error: unknown) {
  console.error(`${where} error:`, error);
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}

/** Parse a JSON body against `schema`; null body or bad shape → `{ ok: false }`. */
export async function readBody<T extends z.ZodTypeAny>(
  req: Request,
  schema: T,
): Promise<{ ok: true; data: z.infer<T> } | { ok: false; issues: z.ZodIssue[] }> {
  let json: unknown;
  try {
    json = await req.json();
  } catch {
    return { ok: false, issues: [] };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) return { ok: false, issues: parsed.error.issues };
  return { ok: true, data: parsed.data };
}
