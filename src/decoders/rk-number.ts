const scratch = new DataView(new ArrayBuffer(8));

export interface RkValue {
  value: number;
  /** True when the record stores a plain integer (no ×100 scaling). */
  isInt: boolean;
}

/**
 * Decodes the 32-bit RK encoding shared by BIFF and XLSB: bit 0 divides
 * by 100, bit 1 selects a 30-bit signed integer over the top 30 bits of
 * an IEEE double.
 */
export function decodeRk(rk: number): RkValue {
  const divide = (rk & 0x01) !== 0;
  const integer = (rk & 0x02) !== 0;
  let value: number;
  if (integer) {
    value = (rk | 0) >> 2;
  } else {
    scratch.setUint32(0, 0, true);
    scratch.setUint32(4, (rk & 0xfffffffc) >>> 0, true);
    value = scratch.getFloat64(0, true);
  }
  if (divide) value /= 100;
  return { value, isInt: integer && !divide };
}
