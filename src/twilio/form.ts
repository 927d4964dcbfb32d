export type FormScalar = string | number | boolean;
export type FormValue = FormScalar | readonly FormScalar[];

/** Ordered `[name, value]` pairs; a name may repeat for list-valued fields. */
export type FormParams = Array<[string, string]>;

/** Shape every encodable body or query must satisfy: each field optional-or-required, never null. */
export type FormShape<T> = { [K in keyof T]?: FormValue };

/**
 * Maps every field of `T` (required and optional alike) to its wire name, so
 * adding a field to a body type without naming it on the wire is a type error.
 */
export type FormFieldNames<T> = { readonly [K in keyof T]-?: string };

/**
 * Encodes a typed body into form pairs. A field is emitted only when its value
 * is not `undefined`: `false`, `0` and `''` are real values and are sent.
 */
export function encodeForm<T extends FormShape<T>>(values: T, names: FormFieldNames<T>): FormParams {
  const params: FormParams = [];

  for (const key in names) {
    const value: FormValue | undefined = values[key];
    if (value === undefined) {
      continue;
    }

    const name = names[key];
    if (typeof value === 'object') {
      for (const item of value) {
        params.push([name, String(item)]);
      }
    } else {
      params.push([name, String(value)]);
    }
  }

  return params;
}

export function formToSearchParams(params: FormParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [name, value] of params) {
    search.append(name, value);
  }
  return search;
}

export function formParamNames(params: FormParams): string[] {
  return params.map(([name]) => name);
}
