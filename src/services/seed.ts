import { ProductInput } from "../models/product";
import { logger } from "./logger";
import { ProductService } from "./productService";

export const SAMPLE_PRODUCTS: ProductInput[] = [
  {
    name: "Mango Liquid",
    category: "liquids",
    price: 450,
    stock: 10,
    description: "Sweet mango flavour",
    emoji: "🥭",
  },
  {
    name: "JUUL Cartridge",
    category: "cartridges",
    price: 300,
    stock: 20,
    description: "Original cartridges",
    emoji: "💨",
  },
  {
    name: "RELX Mint Pod",
    category: "pods",
    price: 280,
    stock: 12,
    description: "Mint flavour",
    emoji: "🔥",
  },
  {
    name: "Vaporesso XROS 3",
    category: "devices",
    price: 2800,
    stock: 5,
    description: "Compact pod system",
    emoji: "⚡",
  },
];

/**
 * Fill an empty catalog with the sample products.
 * Returns the number of products created.
 */
export async function seedSampleProducts(
  products: ProductService,
): Promise<number> {
  const existing = await products.list();
  if (existing.length > 0) {
    return 0;
  }

  for (const sample of SAMPLE_PRODUCTS) {
    await products.save(sample);
  }
  logger.info("Sample catalog seeded", { count: SAMPLE_PRODUCTS.length });
  return SAMPLE_PRODUCTS.length;
}
