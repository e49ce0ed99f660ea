// Fake static database, seeded once at startup and never written to
export interface Product {
  id: number;
  name: string;
}

export const products: readonly Readonly<Product>[] = Object.freeze([
  Object.freeze({ id: 121, name: "Laptop" }),
  Object.freeze({ id: 122, name: "Phone" }),
  Object.freeze({ id: 123, name: "Headphones" }),
]);
