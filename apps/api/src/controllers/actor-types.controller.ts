import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ActorTypeCatalog } from '@simval/domain';

export function createActorTypesRouter(catalog: ActorTypeCatalog): Router {
  const actorTypesRouter = Router();

  /** GET /api/actor-types — footprints for drawing actor boxes on the map */
  actorTypesRouter.get('/', (_req: Request, res: Response) => {
    res.json({
      types: catalog.list().map((type) => ({
        id: type.id,
        name: type.name,
        dimensions: [type.lengthM, type.widthM],
      })),
      vut: catalog.vut,
    });
  });

  return actorTypesRouter;
}
