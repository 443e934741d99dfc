// Location of the product catalog shipped with the engine.

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __catalogDir = dirname(fileURLToPath(import.meta.url));

const CANDIDATES = [
  join(__catalogDir, '..', 'data', 'products.json'),
  // compiled layout: dist/packages/engine/catalog
  join(__catalogDir, '..', '..', '..', '..', 'packages', 'engine', 'data', 'products.json'),
];

export const BUNDLED_PRODUCT_CATALOG: string = CANDIDATES.find(path => existsSync(path)) ?? CANDIDATES[0];
