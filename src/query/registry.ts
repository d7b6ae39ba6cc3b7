import type { FieldDefinition, FieldType, Literal } from './types.js';

export interface FieldSpec<T> {
  property: keyof T & string;
  type: FieldType;
  column?: string;
  values?: readonly string[];
  parse?: (raw: string) => Literal | undefined;
}

export interface RegistryDefinition<T> {
  filterable: Readonly<Record<string, FieldSpec<T>>>;
  sortable?: Readonly<Record<string, FieldSpec<T>>>;
  includes?: readonly string[];
  /** Filterable field matched by the free-text term. Defaults to `title`, then `name`. */
  searchField?: string;
  /** Field used for the default descending sort. Defaults to `createdAt`. */
  createdAtField?: string;
}

export function defineField<T>(name: string, spec: FieldSpec<T>): FieldDefinition<T> {
  if (name.trim() === '') {
    throw new Error('defineField: name must be a non-empty string');
  }
  if (spec.type === 'enum' && (spec.values === undefined || spec.values.length === 0)) {
    throw new Error(`defineField: enum field "${name}" must declare its values`);
  }
  return Object.freeze({ name, ...spec });
}

function indexFields<T>(
  kind: string,
  specs: Readonly<Record<string, FieldSpec<T>>>,
): Map<string, FieldDefinition<T>> {
  const index = new Map<string, FieldDefinition<T>>();
  for (const [name, spec] of Object.entries(specs)) {
    const key = name.toLowerCase();
    if (index.has(key)) {
      throw new Error(`defineRegistry: duplicate ${kind} field "${name}"`);
    }
    index.set(key, defineField(name, spec));
  }
  return index;
}

/**
 * Per-entity whitelist. Filter fields, sort fields and include names that are
 * not declared here never reach a query. Lookups ignore case.
 */
export class FieldRegistry<T> {
  readonly searchField: FieldDefinition<T> | undefined;
  readonly createdAtField: FieldDefinition<T> | undefined;

  private readonly filterIndex: Map<string, FieldDefinition<T>>;
  private readonly sortIndex: Map<string, FieldDefinition<T>>;
  private readonly includeIndex: Map<string, string>;

  constructor(definition: RegistryDefinition<T>) {
    this.filterIndex = indexFields('filterable', definition.filterable);
    this.sortIndex = indexFields('sortable', definition.sortable ?? {});

    this.includeIndex = new Map();
    for (const name of definition.includes ?? []) {
      const trimmed = name.trim();
      if (trimmed === '') {
        throw new Error('defineRegistry: include names must be non-empty');
      }
      this.includeIndex.set(trimmed.toLowerCase(), trimmed);
    }

    if (definition.searchField !== undefined) {
      this.searchField = this.filterField(definition.searchField);
      if (this.searchField === undefined) {
        throw new Error(
          `defineRegistry: searchField "${definition.searchField}" is not a filterable field`,
        );
      }
    } else {
      this.searchField = this.filterField('title') ?? this.filterField('name');
    }

    const createdAtName = definition.createdAtField ?? 'createdAt';
    this.createdAtField = this.sortField(createdAtName) ?? this.filterField(createdAtName);
    if (definition.createdAtField !== undefined && this.createdAtField === undefined) {
      throw new Error(
        `defineRegistry: createdAtField "${definition.createdAtField}" is not a registered field`,
      );
    }
  }

  get filterable(): FieldDefinition<T>[] {
    return [...this.filterIndex.values()];
  }

  get sortable(): FieldDefinition<T>[] {
    return [...this.sortIndex.values()];
  }

  get includes(): string[] {
    return [...this.includeIndex.values()];
  }

  filterField(name: string): FieldDefinition<T> | undefined {
    return this.filterIndex.get(name.toLowerCase());
  }

  sortField(name: string): FieldDefinition<T> | undefined {
    return this.sortIndex.get(name.toLowerCase());
  }

  /** Returns the include name as declared, or undefined when not allowed. */
  includeName(name: string): string | undefined {
    return this.includeIndex.get(name.toLowerCase());
  }
}

export function defineRegistry<T>(definition: RegistryDefinition<T>): FieldRegistry<T> {
  return new FieldRegistry(definition);
}
