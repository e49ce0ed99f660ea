import { products, type Product } from "../data/products.js";

export function getAllProducts(): readonly Readonly<Product>[] {
  return products;
}

export function getProductById(id: number): Readonly<Product> | undefined {
  return products.find((product) => product.id === id);
}
