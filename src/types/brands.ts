// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type UniqueId = Brand<bigint, "UniqueId">;

export const MAX_UINT256 = 2n ** 256n - 1n;

export const asUniqueId = (n: bigint | number | string): UniqueId => {
  const id = BigInt(n);
  if (id < 0n || id > MAX_UINT256) throw new RangeError(`unique id out of range: ${id}`);
  return id as UniqueId;
};

