// ---------------------------------------------------------------------------
// Factories and printers for declarator type chains
// ---------------------------------------------------------------------------

import type {
  ArrayType,
  BaseType,
  DeclInfo,
  DeclType,
  DeclTypeKind,
  FunctionType,
  PointerType,
} from './nodes'

// ---- Constructors ----
export function baseType(name: string): BaseType {
  return { kind: 'Base', name }
}

export function pointerType(qualifiers: string | null, inner: DeclType): PointerType {
  return { kind: 'Pointer', qualifiers, inner }
}

export function arrayType(size: string | null, inner: DeclType): ArrayType {
  return { kind: 'Array', size, inner }
}

export function functionType(params: string, inner: DeclType): FunctionType {
  return { kind: 'Function', params, inner }
}

export function declInfo(identifier: string | null, type: DeclType): DeclInfo {
  return { identifier, type }
}

// ---- Traversal ----

/** Kinds from head to base, e.g. ['Pointer', 'Array', 'Base']. */
export function chainKinds(type: DeclType): DeclTypeKind[] {
  const kinds: DeclTypeKind[] = []
  let node: DeclType = type
  while (node.kind !== 'Base') {
    kinds.push(node.kind)
    node = node.inner
  }
  kinds.push('Base')
  return kinds
}

export function baseOf(type: DeclType): BaseType {
  let node: DeclType = type
  while (node.kind !== 'Base') {
    node = node.inner
  }
  return node
}

/**
 * Compact one-line rendering of a chain, e.g.
 * `Pointer(const) -> Array[3] -> Base(int)`.
 */
export function formatDeclType(type: DeclType): string {
  const parts: string[] = []
  let node: DeclType = type
  for (;;) {
    switch (node.kind) {
      case 'Pointer':
        parts.push(node.qualifiers === null ? 'Pointer' : `Pointer(${node.qualifiers})`)
        node = node.inner
        continue
      case 'Array':
        parts.push(`Array[${node.size ?? ''}]`)
        node = node.inner
        continue
      case 'Function':
        parts.push(`Function(${node.params})`)
        node = node.inner
        continue
      case 'Base':
        parts.push(`Base(${node.name})`)
        return parts.join(' -> ')
    }
  }
}
