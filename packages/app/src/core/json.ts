// CHANGE: plain JSON value type produced when line metadata is dropped
// WHY: decoded trees are compared against ordinary JavaScript values
// FORMAT THEOREM: ∀x ∈ Json: x is closed under array/object nesting with primitive leaves
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json contains no undefined, functions or cycles
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }
