import { Router } from "express";
import { ValidationError } from "../errors.js";
import type { ProductService } from "../services/product.service.js";

export const PRODUCTS_PATH = "/api/products";

function parseId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError({ id: ["Id must be a non-negative integer"] });
  }
  return parseInt(raw, 10);
}

export function createProductRouter(productService: ProductService): Router {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const products = await productService.getAllProducts();
      res.json(products);
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const product = await productService.getProductById(
        parseId(req.params.id),
      );
      if (!product) {
        res.status(404).end();
        return;
      }
      res.json(product);
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req, res, next) => {
    try {
      const product = await productService.createProduct(req.body);
      res
        .status(201)
        .location(`${PRODUCTS_PATH}/${product.id}`)
        .json(product);
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id", async (req, res, next) => {
    try {
      const result = await productService.updateProduct(
        parseId(req.params.id),
        req.body,
      );
      if (result.status === "not_found") {
        res.status(404).end();
        return;
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:id", async (req, res, next) => {
    try {
      const deleted = await productService.deleteProduct(
        parseId(req.params.id),
      );
      if (!deleted) {
        res.status(404).end();
        return;
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
