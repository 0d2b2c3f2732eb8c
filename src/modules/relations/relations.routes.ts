import express from 'express';
import { RelationService } from './relations.service';
import { createRelationsController } from './relations.controller';
import { asyncHandler } from '../../utils/async-handler';

/**
 * Mounted under /products: edges are listed and created per main product
 */
export const createProductRelationRoutes = (relations: RelationService) => {
  const router = express.Router();
  const controller = createRelationsController(relations);

  router.get('/:id/related', asyncHandler(controller.listRelated));
  router.get('/:id/related/available', asyncHandler(controller.listAvailableTargets));
  router.post('/:id/related', asyncHandler(controller.addRelation));

  return router;
};

export const createRelationRoutes = (relations: RelationService) => {
  const router = express.Router();
  const controller = createRelationsController(relations);

  router.delete('/:id', asyncHandler(controller.removeRelation));

  return router;
};
