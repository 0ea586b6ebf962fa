import { BigNumber } from 'ethers';

export const safeStringify = (obj: unknown): string => {
  return JSON.stringify(obj, (_, v: unknown) => {
    if (typeof v === 'bigint') return v.toString();
    if (isSerializedBigNumber(v)) return BigNumber.from(v.hex).toString();
    return v;
  });
};

// BigNumber#toJSON runs before the replacer sees the value
function isSerializedBigNumber(v: unknown): v is { type: 'BigNumber'; hex: string } {
  return (
    typeof v === 'object' &&
    v !== null &&
    'type' in v &&
    v.type === 'BigNumber' &&
    'hex' in v &&
    typeof v.hex === 'string'
  );
}
