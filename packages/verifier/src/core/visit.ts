/**
 * Generic traversal of statements and expressions.
 *
 * Phases with position-dependent rules walk the tree themselves; this is
 * for queries that only care about which nodes occur.
 */

import type { Block, Expr, Stmt } from './ast.ts'
import { assertNever } from './errors.ts'

export interface TreeVisitor {
	/** Return false to skip the expression's children */
	expr?(expr: Expr): boolean | undefined
	stmt?(stmt: Stmt): boolean | undefined
}

/**
 * Direct sub-expressions of an expression. A closure's body is a block,
 * not a child expression.
 */
export function childExprs(expr: Expr): readonly Expr[] {
	switch (expr.kind) {
		case 'Literal':
		case 'Ident':
		case 'Closure':
			return []
		case 'Field':
			return [expr.object]
		case 'Index':
			return [expr.object, expr.index]
		case 'Borrow':
		case 'Deref':
		case 'Unary':
		case 'Cast':
			return [expr.operand]
		case 'Call':
			return [expr.callee, ...expr.args]
		case 'MethodCall':
			return [expr.receiver, ...expr.args]
		case 'StructLit':
			return expr.fields.map((f) => f.value)
		case 'Tuple':
		case 'Array':
			return expr.elements
		case 'Binary':
			return [expr.left, expr.right]
		default:
			return assertNever(expr, 'expression')
	}
}

export function visitExpr(expr: Expr, visitor: TreeVisitor): void {
	if (visitor.expr?.(expr) === false) return
	if (expr.kind === 'Closure') {
		visitBlock(expr.body, visitor)
		return
	}
	for (const child of childExprs(expr)) visitExpr(child, visitor)
}

export function visitStmt(stmt: Stmt, visitor: TreeVisitor): void {
	if (visitor.stmt?.(stmt) === false) return
	switch (stmt.kind) {
		case 'Let':
			if (stmt.init) visitExpr(stmt.init, visitor)
			break
		case 'Assign':
			visitExpr(stmt.target, visitor)
			visitExpr(stmt.value, visitor)
			break
		case 'Expr':
			visitExpr(stmt.expr, visitor)
			break
		case 'Return':
			if (stmt.value) visitExpr(stmt.value, visitor)
			break
		case 'If':
			visitExpr(stmt.condition, visitor)
			visitBlock(stmt.then, visitor)
			if (stmt.else) visitBlock(stmt.else, visitor)
			break
		case 'While':
			visitExpr(stmt.condition, visitor)
			visitBlock(stmt.body, visitor)
			break
		case 'ForIn':
			visitExpr(stmt.iterable, visitor)
			visitBlock(stmt.body, visitor)
			break
		case 'Loop':
		case 'Block':
		case 'Unsafe':
			visitBlock(stmt.body, visitor)
			break
		case 'Break':
		case 'Continue':
			break
		default:
			assertNever(stmt, 'statement')
	}
}

export function visitBlock(block: Block, visitor: TreeVisitor): void {
	for (const stmt of block.statements) visitStmt(stmt, visitor)
}

/**
 * Whether an identifier with this name occurs anywhere in the statements.
 */
export function mentionsName(statements: readonly Stmt[], name: string): boolean {
	let found = false
	const visitor: TreeVisitor = {
		expr: (expr) => {
			if (found) return false
			if (expr.kind === 'Ident' && expr.name === name) found = true
			return !found
		},
		stmt: () => !found,
	}
	for (const stmt of statements) {
		visitStmt(stmt, visitor)
		if (found) return true
	}
	return false
}
