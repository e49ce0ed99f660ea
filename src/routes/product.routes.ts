import { Router, type Request, type Response, type NextFunction } from "express";
import { getProductById } from "../services/product.service.js";

const router = Router();

const INTEGER_PATTERN = /^-?\d+$/;

// Accepts what an integer route parameter would bind: digits, optional sign, safe range
export function parseProductId(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : undefined;
}

// GET /api/products/:id
router.get("/:id", (req, res) => {
  const id = parseProductId(req.params.id);
  if (id === undefined) {
    res.status(400).json({ message: "Invalid product id." });
    return;
  }

  const product = getProductById(id);
  if (!product) {
    res.status(404).json({ message: "Product not found." });
    return;
  }
  res.json({ id: product.id, name: product.name });
});

// Express fails to percent-decode :id (e.g. %ZZ) before the handler runs
router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
  if (err instanceof URIError) {
    res.status(400).json({ message: "Invalid product id." });
    return;
  }
  next(err);
});

export default router;
