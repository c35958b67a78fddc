import type { ContainerHooks, FieldDefinition, FieldRole, RowMapping } from "@vectordef/shared";
import { CollectionDefinition, pairHooks, type NoContainerHooks } from "./collection-definition.js";
import { rowListHooks } from "./container-adapter.js";
import { createField, type FieldOptions } from "./field-definition.js";

/**
 * Explicit construction path for record shapes that cannot describe their
 * own fields, e.g. one definition shared by many anonymous table rows.
 *
 * @example
 * const definition = CollectionDefinitionBuilder.create()
 *   .addField("key", { name: "id", type: "text" })
 *   .addField("vector", { name: "embedding", dimensions: 1536 })
 *   .build();
 */
export class CollectionDefinitionBuilder<TContainer = RowMapping[]> {
  private readonly fields: FieldDefinition[] = [];
  private mode = false;

  private constructor(private readonly hooks: ContainerHooks<TContainer>) {}

  static create(): CollectionDefinitionBuilder<RowMapping[]> {
    return new CollectionDefinitionBuilder(rowListHooks);
  }

  addField(role: FieldRole | string, options?: FieldOptions): this {
    this.fields.push(createField(role, options));
    return this;
  }

  addFields(fields: readonly FieldDefinition[]): this {
    this.fields.push(...fields);
    return this;
  }

  containerMode(enabled = true): this {
    this.mode = enabled;
    return this;
  }

  /**
   * Swap in custom container hooks (both or neither) and switch to container
   * mode. Without hooks the container stays the row list.
   */
  withContainer(hooks: NoContainerHooks): CollectionDefinitionBuilder<RowMapping[]>;
  withContainer<C>(hooks: Partial<ContainerHooks<C>>): CollectionDefinitionBuilder<C>;
  withContainer<C>(
    hooks: Partial<ContainerHooks<C>>
  ): CollectionDefinitionBuilder<C> | CollectionDefinitionBuilder<RowMapping[]> {
    const paired = pairHooks(hooks);
    return paired
      ? this.carryInto(new CollectionDefinitionBuilder(paired))
      : this.carryInto(new CollectionDefinitionBuilder(rowListHooks));
  }

  private carryInto<C>(next: CollectionDefinitionBuilder<C>): CollectionDefinitionBuilder<C> {
    next.fields.push(...this.fields);
    next.mode = true;
    return next;
  }

  build(): CollectionDefinition<TContainer> {
    return new CollectionDefinition(this.fields, this.hooks, { containerMode: this.mode });
  }
}
