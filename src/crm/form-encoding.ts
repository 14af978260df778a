/**
 * Bitrix24 form encoding
 *
 * Bitrix24 REST methods take nested form parameters in bracket notation:
 *   fields[ufCrm38_1768737959][0]=26&fields[ufCrm38_1768737959][1]=28
 *   filter[contactId]=12&select[0]=id
 *
 * An empty array must be sent as an explicit empty value (`fields[x]=`),
 * otherwise Bitrix24 leaves the field untouched.
 */

export type BitrixParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | BitrixParamValue[]
  | { [key: string]: BitrixParamValue };

export type BitrixParams = Record<string, BitrixParamValue>;

function appendValue(out: URLSearchParams, key: string, value: BitrixParamValue): void {
  if (value === undefined) return;

  if (value === null) {
    out.append(key, '');
    return;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      out.append(key, '');
      return;
    }
    value.forEach((item, index) => appendValue(out, `${key}[${index}]`, item));
    return;
  }

  if (typeof value === 'object') {
    for (const [childKey, childValue] of Object.entries(value)) {
      appendValue(out, `${key}[${childKey}]`, childValue);
    }
    return;
  }

  if (typeof value === 'boolean') {
    out.append(key, value ? 'Y' : 'N');
    return;
  }

  out.append(key, String(value));
}

export function encodeBitrixParams(params: BitrixParams): URLSearchParams {
  const out = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    appendValue(out, key, value);
  }
  return out;
}
