// ---------------------------------------------------------------------------
// Declarator type chains
// ---------------------------------------------------------------------------
//
// Chains are ordered outermost to innermost, following the declarator's
// syntactic nesting: a prefix `*` wraps whatever its operand yields, postfix
// `[]` and `()` wrap the declarator built so far, and the specifiers sit at
// the bottom. So `int *x[3]` is Pointer -> Array(3) -> Base(int) while
// `int (*x)[3]` is Array(3) -> Pointer -> Base(int).
// Every non-base node owns its `inner` chain; chains never share nodes.

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

// ---- Type chain nodes ----
export type DeclTypeKind = 'Base' | 'Pointer' | 'Array' | 'Function'

export type DeclType = BaseType | PointerType | ArrayType | FunctionType

export interface BaseType {
  kind: 'Base'
  // Exact source text of the specifiers, e.g. "const unsigned long"
  name: string
}

export interface PointerType {
  kind: 'Pointer'
  // Space-separated qualifiers following the `*`, or null
  qualifiers: string | null
  inner: DeclType
}

export interface ArrayType {
  kind: 'Array'
  // Trimmed text between the brackets; null for `[]`
  size: string | null
  inner: DeclType
}

export interface FunctionType {
  kind: 'Function'
  // Raw text between the parentheses; '' for `()`
  params: string
  inner: DeclType
}

// ---- Parsed declaration ----
export interface DeclInfo {
  // null for abstract declarators (`int *`, `char (*)[4]`)
  identifier: string | null
  type: DeclType
}
