// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Addr = Brand<string, "Addr">;

export const asAddr = (s: string): Addr => s as Addr;
