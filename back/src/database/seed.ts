import type { ProductRepository } from "../repositories/product.repository.js";
import type { CreateProductRequest } from "../models/product.model.js";

export const SEED_PRODUCTS: readonly CreateProductRequest[] = [
  { name: "Squeaky Bone", price: 20.99 },
  { name: "Knotted Rope", price: 12.99 },
];

/**
 * Fills an empty repository with the starter catalog. Returns true when
 * records were inserted. Failures are logged and never rethrown so the
 * server still starts.
 */
export async function seedProducts(
  productRepository: ProductRepository,
  products: readonly CreateProductRequest[] = SEED_PRODUCTS,
): Promise<boolean> {
  try {
    if ((await productRepository.count()) > 0) {
      return false;
    }

    for (const product of products) {
      await productRepository.create(product);
    }
    console.log(`Seeded ${products.length} products`);
    return true;
  } catch (error) {
    console.error("An error occurred seeding the products:", error);
    return false;
  }
}
