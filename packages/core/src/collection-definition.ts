import {
  DefinitionFile,
  type ContainerHooks,
  type FieldDefinition,
  type RowMapping,
  type SchemaDeclaration,
} from "@vectordef/shared";
import { ContainerAdapter, rowListHooks } from "./container-adapter.js";
import { formatIssues, SchemaError, ValidationError } from "./errors.js";
import { createField } from "./field-definition.js";
import { validateFields } from "./validation.js";

export interface DefinitionOptions {
  /** Rows of a bulk container rather than one object per record. */
  containerMode?: boolean;
}

/** Hook object with neither hook set; the definition keeps the default row list. */
export type NoContainerHooks = { toContainer?: undefined; fromContainer?: undefined };

/** Index kind and distance function for vector fields that declare none. */
export interface VectorDefaults {
  indexKind?: string;
  distanceFunction?: string;
}

/**
 * Both hooks, or undefined when neither is set. Exactly one hook is a
 * ValidationError.
 */
export function pairHooks<C>(hooks: Partial<ContainerHooks<C>>): ContainerHooks<C> | undefined {
  const { toContainer, fromContainer } = hooks;
  if (toContainer && fromContainer) return { toContainer, fromContainer };
  if (!toContainer && !fromContainer) return undefined;
  throw new ValidationError(
    "unpaired-container-hooks",
    toContainer ? "fromContainer is missing" : "toContainer is missing"
  );
}

/**
 * Validated, ordered schema for one collection. Field order is the order
 * the backend declares them in. Instances are frozen once constructed.
 */
export class CollectionDefinition<TContainer = RowMapping[]> {
  readonly fields: readonly FieldDefinition[];
  readonly containerMode: boolean;
  readonly keyField: FieldDefinition;
  readonly dataFields: readonly FieldDefinition[];
  readonly vectorFields: readonly FieldDefinition[];
  private readonly adapter: ContainerAdapter<TContainer>;

  constructor(
    fields: readonly FieldDefinition[],
    hooks: ContainerHooks<TContainer>,
    options: DefinitionOptions = {}
  ) {
    validateFields(fields);

    this.fields = Object.freeze([...fields]);
    this.containerMode = options.containerMode ?? false;

    const [key] = this.fields.filter((f) => f.role === "key");
    this.keyField = key;
    this.dataFields = Object.freeze(this.fields.filter((f) => f.role === "data"));
    this.vectorFields = Object.freeze(this.fields.filter((f) => f.role === "vector"));
    this.adapter = new ContainerAdapter(this.storageNames, key.storageName, hooks);
    Object.freeze(this);
  }

  /** Definition whose container is the plain ordered list of rows. */
  static create(
    fields: readonly FieldDefinition[],
    options: DefinitionOptions = {}
  ): CollectionDefinition<RowMapping[]> {
    return new CollectionDefinition(fields, rowListHooks, options);
  }

  /**
   * Definition backed by caller-supplied container hooks; container mode
   * unless told otherwise. Without hooks the container is the row list.
   */
  static withContainer(
    fields: readonly FieldDefinition[],
    hooks: NoContainerHooks,
    options?: DefinitionOptions
  ): CollectionDefinition<RowMapping[]>;
  static withContainer<C>(
    fields: readonly FieldDefinition[],
    hooks: Partial<ContainerHooks<C>>,
    options?: DefinitionOptions
  ): CollectionDefinition<C>;
  static withContainer<C>(
    fields: readonly FieldDefinition[],
    hooks: Partial<ContainerHooks<C>>,
    options: DefinitionOptions = {}
  ): CollectionDefinition<C> | CollectionDefinition<RowMapping[]> {
    const paired = pairHooks(hooks);
    const resolved = { containerMode: true, ...options };
    return paired
      ? new CollectionDefinition(fields, paired, resolved)
      : new CollectionDefinition(fields, rowListHooks, resolved);
  }

  /**
   * Build from a plain definition object, as read from a TOML or JSON file
   * (`[[fields]]` tables with snake_case keys). Vector fields that omit an
   * index kind or distance function take them from `defaults`.
   */
  static fromSpec(spec: unknown, defaults: VectorDefaults = {}): CollectionDefinition<RowMapping[]> {
    const parsed = DefinitionFile.safeParse(spec);
    if (!parsed.success) {
      throw new SchemaError(`invalid definition file (${formatIssues(parsed.error)})`);
    }

    const fields = parsed.data.fields.map((entry) => {
      const isVector = entry.role === "vector";
      return createField(entry.role, {
        name: entry.name,
        storageName: entry.storage_name,
        type: entry.type,
        dimensions: entry.dimensions,
        indexKind: entry.index_kind ?? (isVector ? defaults.indexKind : undefined),
        distanceFunction: entry.distance_function ?? (isVector ? defaults.distanceFunction : undefined),
        isFullTextIndexed: entry.is_full_text_indexed,
        isFilterable: entry.is_filterable,
        defaultValue: entry.default,
      });
    });

    return CollectionDefinition.create(fields, { containerMode: parsed.data.container_mode });
  }

  get storageNames(): string[] {
    return this.fields.map((f) => f.storageName);
  }

  get propertyNames(): string[] {
    return this.fields.flatMap((f) => (f.propertyName === undefined ? [] : [f.propertyName]));
  }

  /** Look a field up by property name first, then by storage name. */
  getField(name: string): FieldDefinition | undefined {
    return (
      this.fields.find((f) => f.propertyName === name) ??
      this.fields.find((f) => f.storageName === name)
    );
  }

  /**
   * Vector field to search against. Without a name the first vector field is
   * used; returns undefined when the collection has none.
   */
  tryGetVectorField(name?: string): FieldDefinition | undefined {
    if (name === undefined) return this.vectorFields[0];
    const field = this.getField(name);
    if (!field) {
      throw new SchemaError(`no field named '${name}'`);
    }
    if (field.role !== "vector") {
      throw new SchemaError(`field '${name}' is a ${field.role} field, not a vector field`);
    }
    return field;
  }

  toContainer(rows: readonly RowMapping[]): TContainer {
    return this.adapter.toContainer(rows);
  }

  fromContainer(container: TContainer): RowMapping[] {
    return this.adapter.fromContainer(container);
  }

  toSchemaDeclaration(): SchemaDeclaration {
    return {
      keyField: this.keyField.storageName,
      containerMode: this.containerMode,
      fields: this.fields.map((f) => ({
        role: f.role,
        storageName: f.storageName,
        propertyName: f.propertyName ?? null,
        valueType: f.valueType ?? null,
        dimensions: f.dimensions ?? null,
        indexKind: f.indexKind ?? null,
        distanceFunction: f.distanceFunction ?? null,
        isFullTextIndexed: f.isFullTextIndexed ?? false,
        isFilterable: f.isFilterable ?? false,
        hasDefault: f.defaultFactory !== undefined,
      })),
    };
  }
}
