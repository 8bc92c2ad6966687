import { IdMismatchError, ValidationError } from "../errors.js";
import {
  type Product,
  type CreateProductRequest,
  type UpdateProductRequest,
  createProductSchema,
  updateProductSchema,
} from "../models/product.model.js";

export interface ProductRepository {
  findAll(): Promise<Product[]>;
  findById(id: number): Promise<Product | null>;
  create(productData: CreateProductRequest): Promise<Product>;
  update(id: number, productData: UpdateProductRequest): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
  count(): Promise<number>;
}

// Each method reads and writes the map without awaiting in between, so
// concurrent requests never interleave inside an operation.
export class InMemoryProductRepository implements ProductRepository {
  private readonly products = new Map<number, Product>();
  private nextId = 1;

  async findAll(): Promise<Product[]> {
    return Array.from(this.products.values(), (product) => ({ ...product }));
  }

  async findById(id: number): Promise<Product | null> {
    const product = this.products.get(id);
    return product ? { ...product } : null;
  }

  async create(productData: CreateProductRequest): Promise<Product> {
    const parsed = createProductSchema.safeParse(productData);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const product: Product = { id: this.nextId++, ...parsed.data };
    this.products.set(product.id, product);
    return { ...product };
  }

  async update(
    id: number,
    productData: UpdateProductRequest,
  ): Promise<Product | null> {
    if (productData.id !== id) {
      throw new IdMismatchError(id, productData.id);
    }

    const parsed = updateProductSchema.safeParse(productData);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    if (!this.products.has(id)) {
      return null;
    }

    // Map.set on an existing key keeps its insertion position.
    const product: Product = { ...parsed.data };
    this.products.set(id, product);
    return { ...product };
  }

  async delete(id: number): Promise<boolean> {
    return this.products.delete(id);
  }

  async count(): Promise<number> {
    return this.products.size;
  }
}
