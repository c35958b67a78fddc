export type FieldRole = "key" | "data" | "vector";

export interface FieldDefinition {
  readonly role: FieldRole;
  readonly propertyName?: string;
  readonly storageName: string;
  readonly valueType?: string;
  readonly dimensions?: number;
  readonly indexKind?: string;
  readonly distanceFunction?: string;
  readonly isFullTextIndexed?: boolean;
  readonly isFilterable?: boolean;
  readonly defaultFactory?: () => unknown;
}

/** A single storage-side row: storage name → value. */
export type RowMapping = Record<string, unknown>;

export interface ContainerHooks<TContainer> {
  toContainer(rows: RowMapping[]): TContainer;
  fromContainer(container: TContainer): RowMapping[];
}

export type ValidationInvariant =
  | "no-key-field"
  | "multiple-key-fields"
  | "duplicate-storage-name"
  | "duplicate-property-name"
  | "missing-dimensions"
  | "unpaired-container-hooks";

/** JSON-safe view of one field, in the order the backend should declare it. */
export interface FieldDeclaration {
  role: FieldRole;
  storageName: string;
  propertyName: string | null;
  valueType: string | null;
  dimensions: number | null;
  indexKind: string | null;
  distanceFunction: string | null;
  isFullTextIndexed: boolean;
  isFilterable: boolean;
  hasDefault: boolean;
}

export interface SchemaDeclaration {
  keyField: string;
  containerMode: boolean;
  fields: FieldDeclaration[];
}
