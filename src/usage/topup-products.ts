import { z } from "zod";

export const topupProductSchema = z.object({
  id: z.string().min(1).max(100),
  grantSeconds: z.number().int().positive(),
});

export type TopupProduct = z.infer<typeof topupProductSchema>;

export const DEFAULT_TOPUP_PRODUCTS: TopupProduct[] = [
  { id: "topup_3h", grantSeconds: 10_800 }, // 3 hours
];

/**
 * Expected grant sizes for purchasable top-ups. Credit rejects any amount
 * that does not match a product here.
 */
export class TopupProductCatalog {
  private readonly products: ReadonlyMap<string, number>;

  constructor(products: TopupProduct[] = DEFAULT_TOPUP_PRODUCTS) {
    const parsed = z.array(topupProductSchema).min(1).parse(products);
    this.products = new Map(parsed.map((p) => [p.id, p.grantSeconds]));
  }

  /**
   * Match a credit request to a product.
   * With `productId`, the seconds must equal that product's grant; without it,
   * the first product with that grant size wins. Returns null on no match.
   */
  match(seconds: number, productId?: string): TopupProduct | null {
    if (productId !== undefined) {
      const grantSeconds = this.products.get(productId);
      return grantSeconds === seconds ? { id: productId, grantSeconds } : null;
    }
    for (const [id, grantSeconds] of this.products) {
      if (grantSeconds === seconds) return { id, grantSeconds };
    }
    return null;
  }

  grantSizes(): number[] {
    return [...new Set(this.products.values())];
  }
}

export const defaultTopupProducts = new TopupProductCatalog();
