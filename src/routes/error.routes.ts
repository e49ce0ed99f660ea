import { Router, type Response } from "express";

const router = Router();

export const GENERIC_ERROR_MESSAGE = "An unexpected error occurred.";

export function sendGenericError(res: Response): void {
  res.status(500).json({ message: GENERIC_ERROR_MESSAGE });
}

// GET /error — also the response the exception handler re-executes
router.get("/", (_req, res) => {
  sendGenericError(res);
});

export default router;
