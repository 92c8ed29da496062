/**
 * Brand reference lookup: does the brand ship its own style references?
 */

import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { isSafeSlug } from '../request.js';

export const REFERENCE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

export interface BrandReferenceProbe {
  hasReferences(brandId: string): Promise<boolean>;
}

/**
 * Looks for images under `<brandsDir>/<brandId>/references/`.
 */
export class FsBrandReferenceProbe implements BrandReferenceProbe {
  constructor(private brandsDir: string) {}

  async hasReferences(brandId: string): Promise<boolean> {
    if (!isSafeSlug(brandId)) return false;
    try {
      const entries = await readdir(join(this.brandsDir, brandId, 'references'), { withFileTypes: true });
      return entries.some((e) => e.isFile() && REFERENCE_EXTENSIONS.includes(extname(e.name).toLowerCase()));
    } catch (err) {
      if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return false;
      throw err;
    }
  }
}
