import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import { ApiError } from "./errors.js";
import type { ProductRepository } from "./repositories/product.repository.js";
import { ProductService } from "./services/product.service.js";
import {
  PRODUCTS_PATH,
  createProductRouter,
} from "./routes/product.routes.js";

export interface AppOptions {
  productRepository: ProductRepository;
  corsOrigin?: string;
}

function isMalformedJson(error: unknown): boolean {
  return (
    error instanceof SyntaxError && "status" in error && error.status === 400
  );
}

const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ApiError) {
    res.status(error.httpStatus).json(error);
    return;
  }

  if (isMalformedJson(error)) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ error: "Internal server error" });
};

export function createApp({
  productRepository,
  corsOrigin = "*",
}: AppOptions): Express {
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  const productService = new ProductService(productRepository);

  // Product Routes
  app.use(PRODUCTS_PATH, createProductRouter(productService));

  // Health check
  app.get("/api/health", (req: Request, res: Response) => {
    res.json({ status: "OK", timestamp: new Date().toISOString() });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(errorHandler);

  return app;
}
