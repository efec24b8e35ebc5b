import type { CatalogProduct } from '../../models/CatalogProduct';

/** Liten katalog för tjänste- och API-tester */
export const TEST_CATALOG: ReadonlyMap<string, CatalogProduct> = new Map([
  ['wheat', { id: 'wheat', nameEs: 'Trigo', nameEn: 'Wheat', icon: 'wheat.png', defaultPricePerThousand: 520 }],
  ['canola', { id: 'canola', nameEs: 'Colza', nameEn: 'Canola', icon: 'canola.png', defaultPricePerThousand: 1020 }],
  ['barley', { id: 'barley', nameEs: 'Cebada', nameEn: 'Barley', icon: 'barley.png', defaultPricePerThousand: 480 }],
]);

/** id00000001, id00000002, ... */
export function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `id${String(next).padStart(8, '0')}`;
  };
}
