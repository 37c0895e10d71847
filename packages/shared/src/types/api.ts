/**
 * Response envelope returned by every KVM endpoint.
 * The client passes it through as decoded; these types only describe it.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface FireEnvelope<TData = JsonValue> {
  status: string;
  requestID: string;
  message: string;
  data: TData;
  [key: string]: JsonValue | TData;
}

/** Power commands answer with an empty list as `data`. */
export type PowerCommandData = never[];
