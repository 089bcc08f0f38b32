/**
 * Product catalog controller
 */

import { Request, Response } from "express";
import { body, matchedData, param, validationResult } from "express-validator";
import { ProductInput } from "../models/product";
import { ProductService } from "../services/productService";
import { errorMeta, logger } from "../services/logger";

export const getProductValidation = [
  param("id").isInt({ min: 1 }).withMessage("Valid product ID is required"),
];

/**
 * POST /api/products
 */
export const createProductValidation = [
  body("name")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Name is required")
    .isLength({ max: 200 })
    .withMessage("Name must be at most 200 characters"),
  body("category")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Category is required"),
  body("price")
    .isInt({ min: 0 })
    .withMessage("Price must be a non-negative integer")
    .toInt(),
  body("stock")
    .isInt({ min: 0 })
    .withMessage("Stock must be a non-negative integer")
    .toInt(),
  body("description").optional().isString(),
  body("emoji").optional().isString().isLength({ max: 16 }),
];

/**
 * PUT /api/products/:id
 * Every field is optional; omitted fields keep their stored values
 */
export const updateProductValidation = [
  ...getProductValidation,
  body("name").optional().isString().trim().notEmpty(),
  body("category").optional().isString().trim().notEmpty(),
  body("price")
    .optional()
    .isInt({ min: 0 })
    .withMessage("Price must be a non-negative integer")
    .toInt(),
  body("stock")
    .optional()
    .isInt({ min: 0 })
    .withMessage("Stock must be a non-negative integer")
    .toInt(),
  body("description").optional().isString(),
  body("emoji").optional().isString().isLength({ max: 16 }),
];

export function createProductHandlers(products: ProductService) {
  async function listProductsHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    try {
      res.json(await products.list());
    } catch (err) {
      logger.error("Failed to list products", errorMeta(err));
      res.status(500).json({ error: "Failed to list products" });
    }
  }

  async function getProductHandler(req: Request, res: Response): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    try {
      const product = await products.get(parseInt(req.params.id, 10));
      if (!product) {
        res.status(404).json({ error: "Product not found" });
        return;
      }
      res.json(product);
    } catch (err) {
      logger.error("Failed to get product", errorMeta(err));
      res.status(500).json({ error: "Failed to get product" });
    }
  }

  async function createProductHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    try {
      const input: ProductInput = matchedData(req, { locations: ["body"] });
      const product = await products.save(input);
      res.status(201).json({ success: true, product });
    } catch (err) {
      logger.error("Failed to create product", errorMeta(err));
      res.status(500).json({ error: "Failed to create product" });
    }
  }

  async function updateProductHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const id = parseInt(req.params.id, 10);

    try {
      // Saving under an unknown id would bypass the allocator
      if (!(await products.get(id))) {
        res.status(404).json({ error: "Product not found" });
        return;
      }

      const input: ProductInput = matchedData(req, { locations: ["body"] });
      const product = await products.save({ ...input, id });
      res.json({ success: true, product });
    } catch (err) {
      logger.error("Failed to update product", {
        ...errorMeta(err),
        productId: id,
      });
      res.status(500).json({ error: "Failed to update product" });
    }
  }

  async function deleteProductHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    try {
      const removed = await products.delete(parseInt(req.params.id, 10));
      if (!removed) {
        res.status(404).json({ error: "Product not found" });
        return;
      }
      res.json({ success: true });
    } catch (err) {
      logger.error("Failed to delete product", errorMeta(err));
      res.status(500).json({ error: "Failed to delete product" });
    }
  }

  return {
    listProductsHandler,
    getProductHandler,
    createProductHandler,
    updateProductHandler,
    deleteProductHandler,
  };
}
