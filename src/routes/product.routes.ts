import { Router, type NextFunction, type Request, type Response } from 'express';
import { logger } from '../core/logger';
import {
  ProductIdParamsSchema,
  ProductPayloadSchema,
  StockPayloadSchema,
  type ProductPayload,
  type ProductResponse,
  type StockPayload,
  type StockResponse,
} from '../core/types';
import type { ProductService } from '../services/product.service.types';
import { parseParams, validateBody } from '../middleware/validate';

export function createProductRoutes(service: ProductService): Router {
  const router = Router();

  // GET /:id (get_product)
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(ProductIdParamsSchema, req);
      logger.debug({ req: { id: req.id }, productId: id }, 'Get product requested');

      const product = await service.getProduct(id);
      const body: ProductResponse = { success: true, data: product };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // GET /:id/stock (get_stock)
  router.get('/:id/stock', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(ProductIdParamsSchema, req);
      logger.debug({ req: { id: req.id }, productId: id }, 'Get stock requested');

      const quantity = await service.getStock(id);
      const body: StockResponse = { success: true, data: { id, quantity } };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // POST / (add_product)
  router.post('/',
    validateBody(ProductPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: ProductPayload = req.body;
        logger.info({ req: { id: req.id }, name: payload.name, quantity: payload.quantity }, 'Add product requested');

        const product = await service.addProduct(payload);
        const body: ProductResponse = { success: true, data: product };
        res.status(201).json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // PUT /:id (update_product)
  router.put('/:id',
    validateBody(ProductPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = parseParams(ProductIdParamsSchema, req);
        const payload: ProductPayload = req.body;
        logger.info({ req: { id: req.id }, productId: id }, 'Update product requested');

        const product = await service.updateProduct(id, payload);
        const body: ProductResponse = { success: true, data: product };
        res.json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /:id/add-quantity (add_quantity)
  router.post('/:id/add-quantity',
    validateBody(StockPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = parseParams(ProductIdParamsSchema, req);
        const payload: StockPayload = req.body;
        logger.info({ req: { id: req.id }, productId: id, amount: payload.amount }, 'Add quantity requested');

        const product = await service.addQuantity(id, payload);
        const body: ProductResponse = { success: true, data: product };
        res.json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /:id/offload-quantity (offload_quantity)
  router.post('/:id/offload-quantity',
    validateBody(StockPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = parseParams(ProductIdParamsSchema, req);
        const payload: StockPayload = req.body;
        logger.info({ req: { id: req.id }, productId: id, amount: payload.amount }, 'Offload quantity requested');

        const product = await service.offloadQuantity(id, payload);
        const body: ProductResponse = { success: true, data: product };
        res.json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // DELETE /:id (remove_product)
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(ProductIdParamsSchema, req);
      logger.info({ req: { id: req.id }, productId: id }, 'Remove product requested');

      const product = await service.removeProduct(id);
      const body: ProductResponse = { success: true, data: product };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
