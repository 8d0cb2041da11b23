/**
 * Raw-pointer detection for dereferences.
 *
 * Resolved types carry an explicit `ptr` kind, which is the primary signal.
 * The syntactic patterns (casts to a pointer, allocation calls, bindings
 * initialized from either) also hold for trees whose pointer types were
 * erased upstream.
 */

import type { Expr } from '../core/ast.ts'
import { isAllocationCall } from '../core/places.ts'
import { isRawPointer } from '../core/types.ts'

/**
 * Whether an expression yields an unmanaged pointer.
 *
 * @param isPointerBinding - true for names bound to a pointer-yielding initializer
 */
export function isRawPointerExpr(expr: Expr, isPointerBinding: (name: string) => boolean): boolean {
	if (isRawPointer(expr.type)) return true
	switch (expr.kind) {
		case 'Cast':
			return isRawPointer(expr.target)
		case 'Call':
			return isAllocationCall(expr)
		case 'Ident':
			return isPointerBinding(expr.name)
		default:
			return false
	}
}
