// src/app/api/products/route.ts
import { NextResponse } from 'next/server';
import { getAliasService } from '@/lib/aliases/server';
import { internalError } from '@/lib/aliases/http';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(req: Request) {
  try {
    const url = new URL(req.url);
    const q = (url.searchParams.get('q') || '').trim();
    const products = await getAliasService().searchProducts(q || null);
    return NextResponse.json({ products });
  } catch (error) {
    return internalError('Products API', error);
  }
}
