/**
 * Actor type catalog
 * Loaded once from actor-types.json; changing a footprint or a name is a data
 * change, not a code change.
 */

import { z } from 'zod';
import type { ActorTypeCatalog, ActorTypeDefinition, VutGeometry } from '@simval/domain';
import catalogFile from './actor-types.json';

const positiveMetres = z.number().positive();

const catalogSchema = z.object({
  vut: z.object({
    lengthM: positiveMetres,
    widthM: positiveMetres,
    cogToFrontM: z.number().min(0),
    cogToLeftM: z.number().min(0),
  }),
  actorTypes: z
    .array(
      z.object({
        id: z.number().int().min(0),
        name: z.string().min(1),
        lengthM: positiveMetres,
        widthM: positiveMetres,
      }),
    )
    .refine((types) => new Set(types.map((t) => t.id)).size === types.length, {
      message: 'actor type ids must be unique',
    }),
});

class StaticActorTypeCatalog implements ActorTypeCatalog {
  private readonly byId: ReadonlyMap<number, ActorTypeDefinition>;

  constructor(
    readonly vut: VutGeometry,
    private readonly types: readonly ActorTypeDefinition[],
  ) {
    this.byId = new Map(types.map((type) => [type.id, type]));
  }

  list(): readonly ActorTypeDefinition[] {
    return this.types;
  }

  nameOf(id: number): string {
    return this.byId.get(id)?.name ?? `type_${id}`;
  }
}

/** Validates raw catalog data; throws ZodError on malformed input. */
export function createActorTypeCatalog(raw: unknown): ActorTypeCatalog {
  const parsed = catalogSchema.parse(raw);
  return new StaticActorTypeCatalog(
    Object.freeze({ ...parsed.vut }),
    Object.freeze(parsed.actorTypes.map((type) => Object.freeze({ ...type }))),
  );
}

let _catalog: ActorTypeCatalog | null = null;

export function getActorTypeCatalog(): ActorTypeCatalog {
  if (!_catalog) _catalog = createActorTypeCatalog(catalogFile);
  return _catalog;
}
