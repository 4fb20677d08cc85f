export interface ActorTypeDefinition {
  readonly id: number;
  readonly name: string;
  readonly lengthM: number;
  readonly widthM: number;
}

/** Footprint of the vehicle under test, anchored at its centre of gravity. */
export interface VutGeometry {
  readonly lengthM: number;
  readonly widthM: number;
  readonly cogToFrontM: number;
  readonly cogToLeftM: number;
}

export interface ActorTypeCatalog {
  readonly vut: VutGeometry;
  list(): readonly ActorTypeDefinition[];
  /** Display name; unknown codes render as `type_<id>`. */
  nameOf(id: number): string;
}
