import test from "node:test";
import assert from "node:assert/strict";
import { seedProducts } from "../../src/database/seed.js";
import {
  InMemoryProductRepository,
  type ProductRepository,
} from "../../src/repositories/product.repository.js";

test("seedProducts: fills an empty store with the two starter products", async (t) => {
  t.mock.method(console, "log", () => {});
  const repository = new InMemoryProductRepository();

  assert.equal(await seedProducts(repository), true);

  assert.deepEqual(await repository.findAll(), [
    { id: 1, name: "Squeaky Bone", price: 20.99 },
    { id: 2, name: "Knotted Rope", price: 12.99 },
  ]);
});

test("seedProducts: leaves a populated store untouched", async (t) => {
  t.mock.method(console, "log", () => {});
  const repository = new InMemoryProductRepository();
  await repository.create({ name: "Plush Squirrel", price: 12.99 });

  assert.equal(await seedProducts(repository), false);
  assert.equal(await seedProducts(repository), false);

  assert.deepEqual(await repository.findAll(), [
    { id: 1, name: "Plush Squirrel", price: 12.99 },
  ]);
});

test("seedProducts: running twice seeds once", async (t) => {
  t.mock.method(console, "log", () => {});
  const repository = new InMemoryProductRepository();

  await seedProducts(repository);
  await seedProducts(repository);

  assert.equal(await repository.count(), 2);
});

test("seedProducts: logs a failing store instead of throwing", async (t) => {
  const errorLog = t.mock.method(console, "error", () => {});
  const failure = new Error("store offline");
  const repository: ProductRepository = {
    findAll: async () => [],
    findById: async () => null,
    create: async () => {
      throw failure;
    },
    update: async () => null,
    delete: async () => false,
    count: async () => 0,
  };

  assert.equal(await seedProducts(repository), false);

  assert.equal(errorLog.mock.callCount(), 1);
  assert.deepEqual(errorLog.mock.calls[0]?.arguments, [
    "An error occurred seeding the products:",
    failure,
  ]);
});
