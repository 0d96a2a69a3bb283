import {
	type Argument,
	BodyBuilder,
	byValue,
	type CallExpr,
	type Capture,
	callOf,
	captureMove,
	captureMut,
	captureRef,
	exclusive,
	type Expr,
	fresh,
	read,
	SharingKind,
	type SourceLocation,
	type Statement,
	shared,
	take,
} from '@tether/analyzer'
import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * A name with the place it was written.
 */
export interface NameSyntax {
	name: string
	loc: SourceLocation
}

export type TypeBodySyntax =
	| { kind: 'capabilities'; flags: NameSyntax[] }
	| { kind: 'struct'; fields: NameSyntax[] }
	| { kind: 'shared'; sharing: SharingKind; inner: NameSyntax }

export interface TypeDeclSyntax {
	kind: 'type'
	name: string
	loc: SourceLocation
	body: TypeBodySyntax
}

export interface FnDeclSyntax {
	kind: 'fn'
	name: string
	loc: SourceLocation
	body: Statement[]
	/** Location of the closing brace */
	endLoc: SourceLocation
}

export type ItemSyntax = TypeDeclSyntax | FnDeclSyntax

/**
 * Result of matching a file.
 */
export type SyntaxResult =
	| { succeeded: true; items: ItemSyntax[] }
	| { succeeded: false; message: string; loc: SourceLocation }

/**
 * tether notation grammar source
 *
 * A file is a list of type declarations and functions. Scope blocks `{ … }`
 * lower to EnterScope/ExitScope; function, loop and closure blocks do not
 * open a scope of their own.
 *
 * Comment syntax (treated as whitespace):
 *   # starts a comment that runs to the end of the line
 */
const grammarSource = String.raw`
Tether {
  File = Item*
  Item = TypeDecl | FnDecl

  // Type declarations
  TypeDecl = type ident "=" TypeBody
  TypeBody = Capabilities | StructType | SharedType
  Capabilities = "{" ListOf<ident, ","> "}"
  StructType = struct "(" ListOf<ident, ","> ")"
  SharedType = sharing "<" ident ">"

  // Functions
  FnDecl = fn ident Block
  Block = "{" Statement* "}"

  // Statements
  Statement = LetStatement | MoveStatement | BorrowStatement | UseStatement
            | CallStatement | SpawnStatement | ClosureStatement | LoopStatement
            | Block | AssignStatement
  LetStatement = let mut? ident ":" ident Initializer?
  Initializer = "=" Expr
  AssignStatement = ident "=" Expr
  MoveStatement = move ident "->" ident
  BorrowStatement = borrow mut? ident "->" ident
  UseStatement = use ident
  CallStatement = call Call
  SpawnStatement = spawn Captures Block Handle?
  ClosureStatement = closure Captures Block Handle?
  LoopStatement = loop Block
  Handle = "->" ident

  Captures = "[" ListOf<Capture, ","> "]"
  Capture = move ident  -- byMove
          | "&" mut ident  -- exclusive
          | "&" ident  -- shared

  // Expressions
  Expr = new  -- fresh
       | Call
       | "*" ident  -- read
       | ident  -- take
  Call = ident "(" ListOf<Argument, ","> ")"
  Argument = "&" mut ident  -- exclusive
           | "&" ident  -- shared
           | ident  -- value

  sharing = arc | rc

  // Keywords
  keyword = type | fn | let | mut | move | borrow | use | call | spawn | closure
          | loop | new | struct | arc | rc
  type = "type" ~identPart
  fn = "fn" ~identPart
  let = "let" ~identPart
  mut = "mut" ~identPart
  move = "move" ~identPart
  borrow = "borrow" ~identPart
  use = "use" ~identPart
  call = "call" ~identPart
  spawn = "spawn" ~identPart
  closure = "closure" ~identPart
  loop = "loop" ~identPart
  new = "new" ~identPart
  struct = "struct" ~identPart
  arc = "arc" ~identPart
  rc = "rc" ~identPart

  // Lexical token rules
  ident (an identifier) = ~keyword identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"

  // Comments treated as whitespace (newlines already in built-in space)
  space += comment
  comment = "#" (~"\n" any)*
}
`

/**
 * The compiled tether notation grammar.
 */
export const TetherGrammar = ohm.grammar(grammarSource)

/**
 * Line and column (both 1-based) of an offset into the source.
 */
export function locationAt(source: string, offset: number): SourceLocation {
	const before = source.substring(0, offset)
	const line = (before.match(/\n/g) || []).length + 1
	return { column: offset - before.lastIndexOf('\n'), line }
}

/** Offset of the first character after whitespace and comments. */
function skipTrivia(source: string, from: number, to: number): number {
	let offset = from
	while (offset < to) {
		const char = source.charAt(offset)
		if (char === '#') {
			const newline = source.indexOf('\n', offset)
			offset = newline === -1 ? to : newline + 1
		} else if (/\s/.test(char)) {
			offset++
		} else {
			break
		}
	}
	return offset
}

function locationOf(node: Node): SourceLocation {
	const { sourceString, startIdx, endIdx } = node.source
	return locationAt(sourceString, skipTrivia(sourceString, startIdx, endIdx))
}

function nameOf(node: Node): NameSyntax {
	return { loc: locationOf(node), name: node.sourceString }
}

function listOf(list: Node): Node[] {
	return list.asIteration().children
}

function optional(iteration: Node): Node | undefined {
	return iteration.children[0]
}

function single(build: (body: BodyBuilder) => BodyBuilder): Statement[] {
	return build(new BodyBuilder()).build()
}

function nestedBody(statements: readonly Statement[]): (body: BodyBuilder) => void {
	return (body) => {
		for (const stmt of statements) body.push(stmt)
	}
}

/**
 * Create semantics for the tether notation grammar.
 */
export function createSemantics(): Semantics {
	const semantics = TetherGrammar.createSemantics()

	semantics.addOperation<Expr>('toExpr', {
		Call(callee: Node, _open: Node, args: Node, _close: Node): CallExpr {
			const lowered: Argument[] = listOf(args).map((arg: Node) => arg['toArgument']())
			return callOf(callee.sourceString, lowered)
		},
		Expr(expr: Node) {
			return expr['toExpr']()
		},
		Expr_fresh(_new: Node) {
			return fresh()
		},
		Expr_read(_star: Node, name: Node) {
			return read(name.sourceString)
		},
		Expr_take(name: Node) {
			return take(name.sourceString)
		},
		Initializer(_equals: Node, value: Node) {
			return value['toExpr']()
		},
	})

	semantics.addOperation<Argument>('toArgument', {
		Argument(arg: Node) {
			return arg['toArgument']()
		},
		Argument_exclusive(_amp: Node, _mut: Node, name: Node) {
			return exclusive(name.sourceString)
		},
		Argument_shared(_amp: Node, name: Node) {
			return shared(name.sourceString)
		},
		Argument_value(name: Node) {
			return byValue(name.sourceString)
		},
	})

	semantics.addOperation<Capture>('toCapture', {
		Capture(capture: Node) {
			return capture['toCapture']()
		},
		Capture_byMove(_move: Node, name: Node) {
			return captureMove(name.sourceString)
		},
		Capture_exclusive(_amp: Node, _mut: Node, name: Node) {
			return captureMut(name.sourceString)
		},
		Capture_shared(_amp: Node, name: Node) {
			return captureRef(name.sourceString)
		},
	})

	semantics.addOperation<Capture[]>('toCaptures', {
		Captures(_open: Node, list: Node, _close: Node) {
			return listOf(list).map((capture: Node) => capture['toCapture']())
		},
	})

	// Block contents without scope statements (function, loop and closure bodies)
	semantics.addOperation<Statement[]>('toBody', {
		Block(_open: Node, statements: Node, _close: Node) {
			return statements.children.flatMap((stmt: Node) => stmt['toStatements']())
		},
	})

	semantics.addOperation<SourceLocation>('closingLoc', {
		Block(_open: Node, _statements: Node, close: Node) {
			return locationOf(close)
		},
	})

	semantics.addOperation<Statement[]>('toStatements', {
		AssignStatement(name: Node, _equals: Node, value: Node) {
			return single((b) => b.assign(name.sourceString, value['toExpr'](), locationOf(this)))
		},
		Block(open: Node, _statements: Node, close: Node) {
			return [
				...single((b) => b.enterScope(locationOf(open))),
				...this['toBody'](),
				...single((b) => b.exitScope(locationOf(close))),
			]
		},
		BorrowStatement(_borrow: Node, mut: Node, binding: Node, _arrow: Node, ref: Node) {
			const loc = locationOf(this)
			return single((b) =>
				mut.numChildren > 0
					? b.borrowExclusive(binding.sourceString, ref.sourceString, loc)
					: b.borrowShared(binding.sourceString, ref.sourceString, loc)
			)
		},
		CallStatement(_call: Node, call: Node) {
			const expr: CallExpr = call['toExpr']()
			return single((b) => b.call(expr.callee, expr.args, locationOf(this)))
		},
		ClosureStatement(_closure: Node, captures: Node, block: Node, handle: Node) {
			const body: Statement[] = block['toBody']()
			const name = optional(handle)
			return single((b) =>
				b.closure(captures['toCaptures'](), nestedBody(body), {
					loc: locationOf(this),
					...(name ? { handle: name['toHandle']() } : {}),
				})
			)
		},
		LetStatement(
			_let: Node,
			mut: Node,
			name: Node,
			_colon: Node,
			type: Node,
			initializer: Node
		) {
			const init = optional(initializer)
			return single((b) =>
				b.declare(name.sourceString, type.sourceString, {
					loc: locationOf(this),
					mutable: mut.numChildren > 0,
					...(init ? { init: init['toExpr']() } : {}),
				})
			)
		},
		LoopStatement(_loop: Node, block: Node) {
			const body: Statement[] = block['toBody']()
			return single((b) => b.loop(nestedBody(body), locationOf(this)))
		},
		MoveStatement(_move: Node, source: Node, _arrow: Node, destination: Node) {
			return single((b) => b.move(source.sourceString, destination.sourceString, locationOf(this)))
		},
		SpawnStatement(_spawn: Node, captures: Node, block: Node, handle: Node) {
			const body: Statement[] = block['toBody']()
			const name = optional(handle)
			return single((b) =>
				b.spawn(captures['toCaptures'](), nestedBody(body), {
					loc: locationOf(this),
					...(name ? { handle: name['toHandle']() } : {}),
				})
			)
		},
		Statement(stmt: Node) {
			return stmt['toStatements']()
		},
		UseStatement(_use: Node, name: Node) {
			return single((b) => b.use(name.sourceString, locationOf(this)))
		},
	})

	semantics.addOperation<string>('toHandle', {
		Handle(_arrow: Node, name: Node) {
			return name.sourceString
		},
	})

	semantics.addOperation<TypeBodySyntax>('toTypeBody', {
		Capabilities(_open: Node, flags: Node, _close: Node) {
			return { flags: listOf(flags).map(nameOf), kind: 'capabilities' }
		},
		SharedType(sharing: Node, _open: Node, inner: Node, _close: Node) {
			return {
				inner: nameOf(inner),
				kind: 'shared',
				sharing:
					sharing.sourceString === 'arc' ? SharingKind.SharedAtomic : SharingKind.SharedNonAtomic,
			}
		},
		StructType(_struct: Node, _open: Node, fields: Node, _close: Node) {
			return { fields: listOf(fields).map(nameOf), kind: 'struct' }
		},
		TypeBody(body: Node) {
			return body['toTypeBody']()
		},
	})

	semantics.addOperation<ItemSyntax>('toItem', {
		FnDecl(_fn: Node, name: Node, block: Node): FnDeclSyntax {
			return {
				body: block['toBody'](),
				endLoc: block['closingLoc'](),
				kind: 'fn',
				loc: locationOf(this),
				name: name.sourceString,
			}
		},
		Item(item: Node) {
			return item['toItem']()
		},
		TypeDecl(_type: Node, name: Node, _equals: Node, body: Node): TypeDeclSyntax {
			return {
				body: body['toTypeBody'](),
				kind: 'type',
				loc: locationOf(this),
				name: name.sourceString,
			}
		},
	})

	semantics.addOperation<ItemSyntax[]>('toItems', {
		File(items: Node) {
			return items.children.map((item: Node) => item['toItem']())
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

const FAILURE_POSITION = /^Line (\d+), col (\d+): (.*)$/s

/**
 * Match a file and extract its declarations.
 *
 * @param source - Notation source text
 * @returns The declarations, or where and why matching failed
 */
export function parseItems(source: string): SyntaxResult {
	const matchResult = TetherGrammar.match(source)

	if (matchResult.failed()) {
		const message = matchResult.shortMessage ?? matchResult.message ?? 'unexpected input'
		const position = FAILURE_POSITION.exec(message)
		if (position === null) return { loc: { column: 1, line: 1 }, message, succeeded: false }
		return {
			loc: { column: Number(position[2]), line: Number(position[1]) },
			message: position[3] ?? message,
			succeeded: false,
		}
	}

	return { items: semantics(matchResult)['toItems'](), succeeded: true }
}

/**
 * Match input against the grammar without extracting semantics.
 */
export function match(input: string): ohm.MatchResult {
	return TetherGrammar.match(input)
}
