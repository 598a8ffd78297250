/**
 * Type Registry
 *
 * The canonical type schema of one run. Catalog types are keyed by OID in
 * the order they were resolved (dependencies before dependents), and every
 * distinct structural shape is given exactly one generated name.
 *
 * Shapes live in separate keyspaces: a composite, a result row and a params
 * holder with the same fields are still three declarations, but two rows with
 * the same fields are one. A composite declaration carries a codec and a row
 * interface does not, so the two never share a name.
 *
 * Queries may also name a shape themselves. Such names are bound before any
 * name is minted, and every use of one must have the same shape.
 */
import type { NamedPgType, PgType, TypeRef } from "./query-ir.js";
import { isNamedPgType } from "./query-ir.js";

/** One field of a structural shape */
export interface ShapeField {
  readonly name: string;
  readonly type: TypeRef;
  readonly nullable: boolean;
  /** Array elements may be NULL; absent for composite fields */
  readonly innerNullable?: boolean;
}

export type ShapeSpace = "composite" | "row" | "params";

/** Outcome of binding a user-chosen name to a shape */
export type NamedShapeResult = "bound" | "mismatch" | "taken";

export class TypeRegistry {
  readonly #types = new Map<TypeRef, PgType>();
  readonly #typeNames = new Map<TypeRef, string>();
  readonly #shapeNames = new Map<string, string>();
  /** User-chosen shape names and the shape key each is bound to */
  readonly #named = new Map<string, string>();
  readonly #taken = new Set<string>();

  constructor(private readonly mintBase: (pgName: string) => string) {}

  has(oid: TypeRef): boolean {
    return this.#types.has(oid);
  }

  get(oid: TypeRef): PgType | undefined {
    return this.#types.get(oid);
  }

  /** Every registered type, dependencies first */
  types(): readonly PgType[] {
    return Array.from(this.#types.values());
  }

  /**
   * Register a fully resolved type. Everything it references must already be
   * registered. Re-registering an OID is a no-op.
   */
  add(type: PgType): void {
    if (this.#types.has(type.oid)) return;
    if (isNamedPgType(type)) {
      this.#typeNames.set(type.oid, this.#nameFor(type));
    }
    this.#types.set(type.oid, type);
  }

  /** Generated declaration name of an enum, domain or composite */
  typeName(oid: TypeRef): string | undefined {
    return this.#typeNames.get(oid);
  }

  /**
   * Structural key of a type. Enums and domains are keyed by identity,
   * composites by their generated name (itself derived from their fields).
   */
  typeKey(oid: TypeRef): string {
    const type = this.#types.get(oid);
    if (!type) return `unknown:${oid}`;
    switch (type.kind) {
      case "scalar":
      case "enum":
      case "domain":
        return `${type.kind}:${oid}`;
      case "composite":
        return `composite:${this.#typeNames.get(oid) ?? oid}`;
      case "array":
        return `${this.typeKey(type.element)}[]`;
      case "range":
        return `range<${this.typeKey(type.element)}>`;
    }
  }

  /**
   * Name of a row, params or composite shape. The first site to produce a
   * shape names it; later identical shapes get the same name back.
   */
  shapeName(space: ShapeSpace, fields: readonly ShapeField[], preferred: string): string {
    const key = this.shapeKey(space, fields);
    const existing = this.#shapeNames.get(key);
    if (existing !== undefined) return existing;
    const name = this.#mint(preferred);
    this.#shapeNames.set(key, name);
    return name;
  }

  /**
   * Bind a user-chosen name to a shape. The first use binds it; later uses
   * must have the same shape. Fails with "taken" when a catalog type or
   * another shape already holds the name.
   */
  namedShape(space: ShapeSpace, fields: readonly ShapeField[], name: string): NamedShapeResult {
    const key = this.shapeKey(space, fields);
    const bound = this.#named.get(name);
    if (bound !== undefined) return bound === key ? "bound" : "mismatch";
    if (this.#taken.has(name)) return "taken";
    this.#taken.add(name);
    this.#named.set(name, key);
    // Unnamed queries of the same shape reuse the chosen name
    if (!this.#shapeNames.has(key)) this.#shapeNames.set(key, name);
    return "bound";
  }

  shapeKey(space: ShapeSpace, fields: readonly ShapeField[]): string {
    return `${space}:${JSON.stringify(
      fields.map(f => [f.name, this.typeKey(f.type), f.nullable, f.innerNullable === true]),
    )}`;
  }

  #nameFor(type: NamedPgType): string {
    const preferred = this.mintBase(type.name);
    if (type.kind !== "composite") return this.#mint(preferred);
    // Composite fields are always nullable: the catalog cannot forbid NULL fields
    return this.shapeName(
      "composite",
      type.fields.map(f => ({ name: f.name, type: f.type, nullable: true })),
      preferred,
    );
  }

  /** Smallest unused name: `base`, then `base2`, `base3`... */
  #mint(base: string): string {
    let name = base;
    for (let n = 2; this.#taken.has(name); n++) {
      name = `${base}${n}`;
    }
    this.#taken.add(name);
    return name;
  }
}
