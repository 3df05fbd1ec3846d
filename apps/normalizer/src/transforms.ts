// apps/normalizer/src/transforms.ts
//
// Named pipe transforms for field paths (`"interfaces | len_if_list"`).
// A registry is built once and handed to the resolver; there is no global table.

export type Transform = (value: unknown) => unknown;

export class TransformRegistry {
  private readonly transforms = new Map<string, Transform>();

  register(name: string, fn: Transform): this {
    this.transforms.set(name, fn);
    return this;
  }

  get(name: string): Transform | undefined {
    return this.transforms.get(name);
  }

  names(): string[] {
    return [...this.transforms.keys()].sort();
  }
}

export function lenIfList(value: unknown): number {
  return Array.isArray(value) ? value.length : 0;
}

export function first(value: unknown): unknown {
  return Array.isArray(value) && value.length ? value[0] : undefined;
}

export function createDefaultTransforms(): TransformRegistry {
  return new TransformRegistry().register("len_if_list", lenIfList).register("first", first);
}
