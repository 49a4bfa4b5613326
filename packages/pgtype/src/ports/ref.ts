/**
 * Write-through destination for a scan.
 *
 * `kind` names what the reference accepts; codecs compare it against the
 * decoded value before calling `set`.
 */
export interface Ref<T> {
  readonly kind: string
  readonly value: T | undefined
  set(value: T): void
}

export function isRef(value: unknown): value is Ref<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    "set" in value &&
    typeof value.set === "function"
  )
}
