/**
 * Resolved syntax tree consumed by the verifier.
 *
 * The tree arrives fully parsed, name-resolved and type-annotated: every
 * expression carries its resolved type and every call carries the signature
 * of the callable it resolved to. The node set is closed; every phase matches
 * on `kind` exhaustively.
 */

/**
 * Source position of a node (1-indexed).
 */
export interface Span {
	readonly line: number
	readonly column: number
	readonly length?: number
}

// =============================================================================
// TYPES
// =============================================================================

export interface NamedType {
	readonly kind: 'named'
	readonly name: string
	readonly args?: readonly TypeRef[]
}

export interface RefType {
	readonly kind: 'ref'
	readonly mutable: boolean
	readonly inner: TypeRef
}

/** Unmanaged pointer; only usable inside unsafe blocks. */
export interface PtrType {
	readonly kind: 'ptr'
	readonly mutable: boolean
	readonly inner: TypeRef
}

export interface TupleType {
	readonly kind: 'tuple'
	readonly elements: readonly TypeRef[]
}

export interface ArrayType {
	readonly kind: 'array'
	readonly element: TypeRef
}

export interface FnType {
	readonly kind: 'fn'
	readonly params: readonly TypeRef[]
	readonly returns: TypeRef
	/** True for closure values, false for function items */
	readonly closure: boolean
}

export type TypeRef = NamedType | RefType | PtrType | TupleType | ArrayType | FnType

// =============================================================================
// CALLABLES
// =============================================================================

export interface ParamSig {
	readonly name: string
	readonly type: TypeRef
}

/**
 * The callable a call site resolved to, as seen from the call site.
 */
export interface CallableSignature {
	readonly name: string
	/** Mutability contract: does calling this change the receiver? */
	readonly mutating: boolean
	readonly params: readonly ParamSig[]
	readonly returns: TypeRef
	/** How a method takes its receiver; `value` consumes it. Defaults to `ref`. */
	readonly receiver?: 'ref' | 'value'
	/** Calling this callable requires an unsafe block */
	readonly unsafe?: boolean
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

interface ExprBase {
	readonly span?: Span
	/** Resolved type of the expression */
	readonly type: TypeRef
}

export interface LiteralExpr extends ExprBase {
	readonly kind: 'Literal'
	readonly value: string | number | boolean | null
}

export interface IdentExpr extends ExprBase {
	readonly kind: 'Ident'
	readonly name: string
}

export interface FieldExpr extends ExprBase {
	readonly kind: 'Field'
	readonly object: Expr
	readonly field: string
}

export interface IndexExpr extends ExprBase {
	readonly kind: 'Index'
	readonly object: Expr
	readonly index: Expr
}

export interface BorrowExpr extends ExprBase {
	readonly kind: 'Borrow'
	readonly mutable: boolean
	readonly operand: Expr
}

export interface DerefExpr extends ExprBase {
	readonly kind: 'Deref'
	readonly operand: Expr
}

export interface CallExpr extends ExprBase {
	readonly kind: 'Call'
	/** Function item or callable value (closure binding) */
	readonly callee: Expr
	readonly signature: CallableSignature
	readonly args: readonly Expr[]
	/** The call-site `!` marker announcing a mutating call */
	readonly mutationMarker: boolean
}

export interface MethodCallExpr extends ExprBase {
	readonly kind: 'MethodCall'
	readonly receiver: Expr
	readonly method: string
	readonly signature: CallableSignature
	readonly args: readonly Expr[]
	readonly mutationMarker: boolean
}

export interface FieldInit {
	readonly name: string
	readonly value: Expr
	readonly span?: Span
}

export interface StructLitExpr extends ExprBase {
	readonly kind: 'StructLit'
	readonly name: string
	readonly fields: readonly FieldInit[]
}

export interface TupleExpr extends ExprBase {
	readonly kind: 'Tuple'
	readonly elements: readonly Expr[]
}

export interface ArrayExpr extends ExprBase {
	readonly kind: 'Array'
	readonly elements: readonly Expr[]
}

export interface BinaryExpr extends ExprBase {
	readonly kind: 'Binary'
	readonly op: string
	readonly left: Expr
	readonly right: Expr
}

export interface UnaryExpr extends ExprBase {
	readonly kind: 'Unary'
	readonly op: string
	readonly operand: Expr
}

export interface CastExpr extends ExprBase {
	readonly kind: 'Cast'
	readonly operand: Expr
	readonly target: TypeRef
}

export interface ClosureExpr extends ExprBase {
	readonly kind: 'Closure'
	readonly params: readonly Param[]
	readonly body: Block
}

export type Expr =
	| LiteralExpr
	| IdentExpr
	| FieldExpr
	| IndexExpr
	| BorrowExpr
	| DerefExpr
	| CallExpr
	| MethodCallExpr
	| StructLitExpr
	| TupleExpr
	| ArrayExpr
	| BinaryExpr
	| UnaryExpr
	| CastExpr
	| ClosureExpr

// =============================================================================
// STATEMENTS
// =============================================================================

export interface Block {
	readonly statements: readonly Stmt[]
	readonly span?: Span
}

interface StmtBase {
	readonly span?: Span
}

export interface LetStmt extends StmtBase {
	readonly kind: 'Let'
	readonly name: string
	readonly mutable: boolean
	readonly type: TypeRef
	/** Absent for `let x;` - the binding starts uninitialized */
	readonly init?: Expr
}

export interface AssignStmt extends StmtBase {
	readonly kind: 'Assign'
	readonly target: Expr
	readonly value: Expr
	/** Compound operator (`+=` is `+`); compound assignments also read the target */
	readonly op?: string
}

export interface ExprStmt extends StmtBase {
	readonly kind: 'Expr'
	readonly expr: Expr
}

export interface ReturnStmt extends StmtBase {
	readonly kind: 'Return'
	readonly value?: Expr
}

export interface IfStmt extends StmtBase {
	readonly kind: 'If'
	readonly condition: Expr
	readonly then: Block
	/** `else if` chains nest an If inside the else block */
	readonly else?: Block
}

export interface WhileStmt extends StmtBase {
	readonly kind: 'While'
	readonly condition: Expr
	readonly body: Block
}

export interface LoopStmt extends StmtBase {
	readonly kind: 'Loop'
	readonly body: Block
}

export interface ForInStmt extends StmtBase {
	readonly kind: 'ForIn'
	readonly name: string
	readonly mutable: boolean
	readonly type: TypeRef
	readonly iterable: Expr
	readonly body: Block
}

export interface BlockStmt extends StmtBase {
	readonly kind: 'Block'
	readonly body: Block
}

export interface UnsafeStmt extends StmtBase {
	readonly kind: 'Unsafe'
	readonly body: Block
}

export interface BreakStmt extends StmtBase {
	readonly kind: 'Break'
}

export interface ContinueStmt extends StmtBase {
	readonly kind: 'Continue'
}

export type Stmt =
	| LetStmt
	| AssignStmt
	| ExprStmt
	| ReturnStmt
	| IfStmt
	| WhileStmt
	| LoopStmt
	| ForInStmt
	| BlockStmt
	| UnsafeStmt
	| BreakStmt
	| ContinueStmt

// =============================================================================
// ITEMS
// =============================================================================

export interface Param {
	readonly name: string
	readonly mutable: boolean
	readonly type: TypeRef
	readonly span?: Span
}

export interface Receiver {
	readonly name: string
	/** Receiver declared mutable (`self!`) */
	readonly mutable: boolean
	readonly type: TypeRef
	readonly span?: Span
}

export interface FunctionDecl {
	readonly kind: 'Function'
	readonly name: string
	readonly params: readonly Param[]
	readonly receiver?: Receiver
	readonly returns: TypeRef
	/** Mutability contract of this callable */
	readonly mutating: boolean
	readonly body: Block
	/** Struct or impl target this method belongs to */
	readonly owner?: string
	readonly span?: Span
}

export interface FieldDecl {
	readonly name: string
	readonly type: TypeRef
}

export interface StructDecl {
	readonly kind: 'Struct'
	readonly name: string
	readonly fields: readonly FieldDecl[]
	readonly methods: readonly FunctionDecl[]
	/** Values of this struct may be duplicated implicitly */
	readonly copy?: boolean
	readonly span?: Span
}

export interface ContractMethod {
	readonly name: string
	readonly mutating: boolean
	readonly signature?: CallableSignature
	readonly span?: Span
}

export interface ContractDecl {
	readonly kind: 'Contract'
	readonly name: string
	readonly methods: readonly ContractMethod[]
	readonly span?: Span
}

export interface ImplDecl {
	readonly kind: 'Impl'
	readonly contract: string
	readonly target: string
	readonly methods: readonly FunctionDecl[]
	readonly span?: Span
}

export interface ConstDecl {
	readonly kind: 'Const'
	readonly name: string
	readonly type: TypeRef
	readonly value: Expr
	readonly span?: Span
}

/**
 * A callable defined outside the unit, such as a runtime library function.
 * It is declared so call sites resolve; it has no body to check.
 */
export interface ExternDecl {
	readonly kind: 'Extern'
	readonly name: string
	readonly signature: CallableSignature
	readonly span?: Span
}

export type Item = FunctionDecl | ExternDecl | StructDecl | ContractDecl | ImplDecl | ConstDecl

export interface Program {
	readonly items: readonly Item[]
}
