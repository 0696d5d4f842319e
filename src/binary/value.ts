export type PackValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | PackValue[]
  | PackObject;

export type PackObject = { [key: string]: PackValue };

/** Plain objects only; class instances, Maps and Dates are not dictionaries. */
export const isPackObject = (value: unknown): value is PackObject => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};
