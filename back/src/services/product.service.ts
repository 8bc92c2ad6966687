import type { ProductRepository } from "../repositories/product.repository.js";
import { IdMismatchError, ValidationError } from "../errors.js";
import {
  type Product,
  createProductSchema,
  updateProductSchema,
} from "../models/product.model.js";

export type UpdateProductResult =
  | { status: "updated"; product: Product }
  | { status: "not_found" };

function readBodyId(body: unknown): unknown {
  if (typeof body === "object" && body !== null && "id" in body) {
    return body.id;
  }
  return undefined;
}

export class ProductService {
  private productRepository: ProductRepository;

  constructor(productRepository: ProductRepository) {
    this.productRepository = productRepository;
  }

  async getAllProducts() {
    return await this.productRepository.findAll();
  }

  async getProductById(id: number) {
    return await this.productRepository.findById(id);
  }

  async createProduct(body: unknown) {
    const parsed = createProductSchema.safeParse(body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    return await this.productRepository.create(parsed.data);
  }

  async updateProduct(id: number, body: unknown): Promise<UpdateProductResult> {
    const bodyId = readBodyId(body);
    if (bodyId !== id) {
      throw new IdMismatchError(id, bodyId);
    }

    const parsed = updateProductSchema.safeParse(body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const product = await this.productRepository.update(id, parsed.data);
    if (!product) {
      return { status: "not_found" };
    }
    return { status: "updated", product };
  }

  async deleteProduct(id: number) {
    return await this.productRepository.delete(id);
  }
}
