/**
 * Product catalog routes
 */

import { Router } from "express";
import {
  createProductHandlers,
  createProductValidation,
  getProductValidation,
  updateProductValidation,
} from "../controllers/productController";
import { requireAdmin } from "../middleware/auth";
import { Services } from "../services";

export function productRoutes(services: Services): Router {
  const router = Router();
  const handlers = createProductHandlers(services.products);

  // GET /api/products - Public catalog
  router.get("/", handlers.listProductsHandler);

  // GET /api/products/:id
  router.get("/:id", getProductValidation, handlers.getProductHandler);

  // POST /api/products - Create product (admin only)
  router.post(
    "/",
    requireAdmin,
    createProductValidation,
    handlers.createProductHandler,
  );

  // PUT /api/products/:id - Update product (admin only)
  router.put(
    "/:id",
    requireAdmin,
    updateProductValidation,
    handlers.updateProductHandler,
  );

  // DELETE /api/products/:id - Delete product (admin only)
  router.delete(
    "/:id",
    requireAdmin,
    getProductValidation,
    handlers.deleteProductHandler,
  );

  return router;
}
