// src/app/api/synonyms/route.ts
import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getSynonymStore } from '@/lib/aliases/server';
import { badRequest, internalError, readBody, rejected } from '@/lib/aliases/http';
import { addSynonyms } from '@/lib/synonyms';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const SynonymBodySchema = z.object({
  principal: z.string(),
  name: z.string().nullable().optional(),
  raw: z.string(),
});

export async function POST(req: Request) {
  try {
    const body = await readBody(req, SynonymBodySchema);
    if (!body.ok) {
      return badRequest('Invalid body: expected { principal, name?, raw }', body.issues);
    }

    const { principal, name, raw } = body.data;
    const outcome = await addSynonyms(getSynonymStore(), { principal, name, rawBlock: raw });
    if (outcome.status === 'rejected') return rejected(outcome.error);
    return NextResponse.json({ outcome });
  } catch (error) {
    return internalError('Synonyms API', error);
  }
}
