export abstract class TypeSymbol {
  abstract get name(): string;
  /**
   * Whether values of this type denote mutable storage that can be shared.
   * Only reference values take part in alias tracking.
   */
  abstract get isReference(): boolean;
}

export class PrimitiveTypeSymbol extends TypeSymbol {
  constructor(private readonly typeName: string) {
    super();
  }

  get name(): string {
    return this.typeName;
  }

  get isReference(): boolean {
    return false;
  }
}

export class ObjectTypeSymbol extends TypeSymbol {
  constructor(private readonly typeName = "object") {
    super();
  }

  get name(): string {
    return this.typeName;
  }

  get isReference(): boolean {
    return true;
  }
}

export class ArrayTypeSymbol extends TypeSymbol {
  constructor(
    public readonly elementType: TypeSymbol,
    public readonly dimensions = 1,
  ) {
    super();
  }

  get name(): string {
    return `${this.elementType.name}${"[]".repeat(this.dimensions)}`;
  }

  get isReference(): boolean {
    return true;
  }
}

// Strings are immutable, so they are primitives here.
export const PrimitiveTypes = {
  int32: new PrimitiveTypeSymbol("int32"),
  float64: new PrimitiveTypeSymbol("float64"),
  boolean: new PrimitiveTypeSymbol("boolean"),
  string: new PrimitiveTypeSymbol("string"),
} as const;

export const ObjectType = new ObjectTypeSymbol();

export const isPrimitiveTypeName = (
  name: string,
): name is keyof typeof PrimitiveTypes => {
  return Object.prototype.hasOwnProperty.call(PrimitiveTypes, name);
};
