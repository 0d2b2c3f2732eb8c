import { Request, Response } from 'express';
import { z } from 'zod';
import { RelationService } from './relations.service';
import { idSchema } from '../catalog/catalog.validation';
import { IdParams } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';

const addRelationBodySchema = z.object({
  related_product_id: idSchema,
});

export const createRelationsController = (relations: RelationService) => ({
  listRelated: async (req: Request<IdParams>, res: Response) => {
    const edges = await relations.listRelated(idSchema.parse(req.params.id));
    return ResponseHandler.success(res, edges);
  },

  listAvailableTargets: async (req: Request<IdParams>, res: Response) => {
    const products = await relations.listAvailableTargets(idSchema.parse(req.params.id));
    return ResponseHandler.success(res, products);
  },

  addRelation: async (req: Request<IdParams>, res: Response) => {
    const mainProductId = idSchema.parse(req.params.id);
    const { related_product_id } = addRelationBodySchema.parse(req.body);

    const relationId = await relations.addRelation(mainProductId, related_product_id);
    if (relationId === null) {
      return ResponseHandler.conflict(res, 'Relation already exists or links a product to itself', {
        main_product_id: mainProductId,
        related_product_id,
      });
    }
    return ResponseHandler.created(res, { id: relationId }, 'Relation created');
  },

  removeRelation: async (req: Request<IdParams>, res: Response) => {
    const relationId = idSchema.parse(req.params.id);
    const removed = await relations.removeRelation(relationId);
    return ResponseHandler.success(res, { id: relationId, removed }, removed ? 'Relation removed' : 'Relation did not exist');
  },
});
