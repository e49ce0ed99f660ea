import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "../src/app.js";
import { parseProductId } from "../src/routes/product.routes.js";

const app = createApp({ forceHttps: false });

describe("GET /api/products/:id", () => {
  it.each([
    [121, "Laptop"],
    [122, "Phone"],
    [123, "Headphones"],
  ])("should return 200 for product %i", async (id, name) => {
    const res = await request(app).get(`/api/products/${id}`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/application\/json/);
    expect(res.body).toEqual({ id, name });
  });

  it("should return exactly the id and name fields", async () => {
    const res = await request(app).get("/api/products/121");
    expect(Object.keys(res.body)).toEqual(["id", "name"]);
  });

  it.each(["1", "0", "-1", "120", "124", "999"])(
    "should return 404 for unknown id %s",
    async (id) => {
      const res = await request(app).get(`/api/products/${id}`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: "Product not found." });
    },
  );

  it.each(["abc", "12.5", "121abc", "99999999999999999999"])(
    "should return 400 for malformed id %s",
    async (id) => {
      const res = await request(app).get(`/api/products/${id}`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: "Invalid product id." });
    },
  );
});

describe("GET /api/products/:id with undecodable ids", () => {
  it.each(["%ZZ", "12%", "%E0%A4%A"])("should return 400 for %s", async (id) => {
    const res = await request(app).get(`/api/products/${id}`);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ message: "Invalid product id." });
  });
});

describe("parseProductId", () => {
  it("should parse signed integers", () => {
    expect(parseProductId("121")).toBe(121);
    expect(parseProductId("-5")).toBe(-5);
    expect(parseProductId("007")).toBe(7);
  });

  it("should reject anything else", () => {
    expect(parseProductId("")).toBeUndefined();
    expect(parseProductId(" 121")).toBeUndefined();
    expect(parseProductId("1e3")).toBeUndefined();
    expect(parseProductId("9007199254740993")).toBeUndefined();
  });
});
