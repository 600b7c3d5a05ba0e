// CHANGE: TypeScript/JavaScript outline adapter over the compiler API
// WHY: Shell must not embed parsing logic; outlines belong to CORE for testability
// SOURCE: https://github.com/microsoft/TypeScript/wiki/Using-the-Compiler-API
// FORMAT THEOREM: ∀content: outlineTypeScript(content) = right(o) ⇔ no syntactic diagnostics
// PURITY: CORE
// INVARIANT: No IO/side effects; deterministic outcomes for identical inputs
// COMPLEXITY: O(m) where m = |nodes|

import { Either } from "effect";
import ts from "typescript";

import type {
	CallOutline,
	ClassOutline,
	Construct,
	ConstructorOutline,
	FunctionOutline,
	ImportOutline,
	Instantiation,
	SourceOutline,
} from "./outline.js";

const SCRIPT_KIND_BY_EXTENSION: Record<string, ts.ScriptKind> = {
	".ts": ts.ScriptKind.TS,
	".mts": ts.ScriptKind.TS,
	".cts": ts.ScriptKind.TS,
	".tsx": ts.ScriptKind.TSX,
	".js": ts.ScriptKind.JS,
	".jsx": ts.ScriptKind.JSX,
	".mjs": ts.ScriptKind.JS,
	".cjs": ts.ScriptKind.JS,
};

function resolveScriptKind(fileName: string): ts.ScriptKind {
	const dot = fileName.lastIndexOf(".");
	const extension = dot < 0 ? "" : fileName.slice(dot).toLowerCase();
	return SCRIPT_KIND_BY_EXTENSION[extension] ?? ts.ScriptKind.TS;
}

const CHAIN_OPERATORS = new Set<ts.SyntaxKind>([
	ts.SyntaxKind.AmpersandAmpersandToken,
	ts.SyntaxKind.BarBarToken,
	ts.SyntaxKind.QuestionQuestionToken,
]);

type FunctionLike =
	| ts.FunctionDeclaration
	| ts.FunctionExpression
	| ts.ArrowFunction
	| ts.MethodDeclaration
	| ts.ConstructorDeclaration
	| ts.GetAccessorDeclaration
	| ts.SetAccessorDeclaration;

function isFunctionLike(node: ts.Node): node is FunctionLike {
	return (
		ts.isFunctionDeclaration(node) ||
		ts.isFunctionExpression(node) ||
		ts.isArrowFunction(node) ||
		ts.isMethodDeclaration(node) ||
		ts.isConstructorDeclaration(node) ||
		ts.isGetAccessor(node) ||
		ts.isSetAccessor(node)
	);
}

function propertyNameText(name: ts.PropertyName): string | undefined {
	if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name)) return name.text;
	if (ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
	return undefined;
}

/**
 * Name of a function-like node; expressions borrow the name they are bound to.
 */
function functionName(node: FunctionLike): string {
	if (ts.isConstructorDeclaration(node)) return "constructor";
	if (node.name !== undefined) {
		const own = propertyNameText(node.name);
		if (own !== undefined) return own;
	}
	const parent = node.parent;
	if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) return parent.name.text;
	if (ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent)) {
		return propertyNameText(parent.name) ?? "<anonymous>";
	}
	return "<anonymous>";
}

function lineOf(sourceFile: ts.SourceFile, position: number): number {
	return sourceFile.getLineAndCharacterOfPosition(position).line + 1;
}

function chainOperands(node: ts.Expression, operator: ts.SyntaxKind): readonly ts.Expression[] {
	if (ts.isBinaryExpression(node) && node.operatorToken.kind === operator) {
		return [...chainOperands(node.left, operator), ...chainOperands(node.right, operator)];
	}
	return [node];
}

function isChainRoot(node: ts.BinaryExpression): boolean {
	const parent = node.parent;
	return !(
		ts.isBinaryExpression(parent) &&
		parent.operatorToken.kind === node.operatorToken.kind
	);
}

/**
 * Construct tree of a function body; nested functions are skipped.
 */
function collectConstructs(root: ts.Node, sourceFile: ts.SourceFile): readonly Construct[] {
	const visitChildren = (node: ts.Node): Construct[] => {
		const found: Construct[] = [];
		ts.forEachChild(node, (child) => {
			found.push(...visit(child));
		});
		return found;
	};

	const make = (kind: Construct["kind"], node: ts.Node, children: Construct[]): Construct => ({
		kind,
		line: lineOf(sourceFile, node.getStart(sourceFile)),
		children,
	});

	const visit = (node: ts.Node): Construct[] => {
		if (isFunctionLike(node)) return [];
		if (ts.isIfStatement(node)) {
			const body = [...visit(node.expression), ...visit(node.thenStatement)];
			const branch = make("branch", node, body);
			const elseBranch = node.elseStatement;
			if (elseBranch === undefined) return [branch];
			// else-if chains stay at the same depth
			return ts.isIfStatement(elseBranch)
				? [branch, ...visit(elseBranch)]
				: [{ ...branch, children: [...body, ...visit(elseBranch)] }];
		}
		if (
			ts.isForStatement(node) ||
			ts.isForInStatement(node) ||
			ts.isForOfStatement(node) ||
			ts.isWhileStatement(node) ||
			ts.isDoStatement(node)
		) {
			return [make("loop", node, visitChildren(node))];
		}
		if (ts.isTryStatement(node)) return [make("guard", node, visitChildren(node))];
		if (ts.isCaseClause(node)) return [make("branch", node, visitChildren(node))];
		if (ts.isCatchClause(node)) return [make("handler", node, visitChildren(node))];
		if (ts.isConditionalExpression(node)) {
			return [make("conditional", node, visitChildren(node))];
		}
		if (
			ts.isBinaryExpression(node) &&
			CHAIN_OPERATORS.has(node.operatorToken.kind) &&
			isChainRoot(node)
		) {
			const operands = chainOperands(node, node.operatorToken.kind);
			return [
				{
					kind: "boolean-chain",
					line: lineOf(sourceFile, node.getStart(sourceFile)),
					operands: operands.length,
					children: operands.flatMap((operand) => visit(operand)),
				},
			];
		}
		return visitChildren(node);
	};

	return visitChildren(root);
}

function parameterNames(node: FunctionLike, sourceFile: ts.SourceFile): readonly string[] {
	return node.parameters.map((param) =>
		ts.isIdentifier(param.name) ? param.name.text : param.name.getText(sourceFile),
	);
}

function calleeName(expression: ts.Expression): string | undefined {
	if (ts.isIdentifier(expression)) return expression.text;
	if (expression.kind === ts.SyntaxKind.ThisKeyword) return "this";
	if (ts.isPropertyAccessExpression(expression)) {
		const owner = calleeName(expression.expression);
		return owner === undefined ? undefined : `${owner}.${expression.name.text}`;
	}
	return undefined;
}

function constructorOutline(
	node: ts.ConstructorDeclaration,
	sourceFile: ts.SourceFile,
): ConstructorOutline {
	const instantiations: Instantiation[] = [];
	const visit = (child: ts.Node): void => {
		if (ts.isNewExpression(child)) {
			const typeName = calleeName(child.expression);
			if (typeName !== undefined) {
				instantiations.push({ typeName, line: lineOf(sourceFile, child.getStart(sourceFile)) });
			}
		}
		ts.forEachChild(child, visit);
	};
	if (node.body !== undefined) visit(node.body);
	return {
		line: lineOf(sourceFile, node.getStart(sourceFile)),
		params: node.parameters.map((param) => ({
			name: ts.isIdentifier(param.name) ? param.name.text : param.name.getText(sourceFile),
			...(param.type === undefined ? {} : { type: param.type.getText(sourceFile) }),
		})),
		instantiations,
	};
}

function classOutline(
	node: ts.ClassLikeDeclaration,
	sourceFile: ts.SourceFile,
): ClassOutline {
	let methodCount = 0;
	let ctor: ConstructorOutline | null = null;
	for (const member of node.members) {
		if (ts.isConstructorDeclaration(member)) {
			methodCount += 1;
			if (member.body !== undefined) ctor = constructorOutline(member, sourceFile);
		} else if (
			ts.isMethodDeclaration(member) ||
			ts.isGetAccessor(member) ||
			ts.isSetAccessor(member)
		) {
			methodCount += 1;
		}
	}
	return {
		name: node.name?.text ?? "<anonymous>",
		line: lineOf(sourceFile, node.getStart(sourceFile)),
		endLine: lineOf(sourceFile, node.getEnd()),
		methodCount,
		constructorInfo: ctor,
	};
}

function importOutline(node: ts.ImportDeclaration, sourceFile: ts.SourceFile): ImportOutline | undefined {
	if (!ts.isStringLiteral(node.moduleSpecifier)) return undefined;
	const clause = node.importClause;
	const names: string[] = [];
	let typeOnly = clause?.isTypeOnly ?? false;
	if (clause?.name !== undefined) names.push(clause.name.text);
	const bindings = clause?.namedBindings;
	if (bindings !== undefined) {
		if (ts.isNamespaceImport(bindings)) {
			names.push(bindings.name.text);
		} else {
			names.push(...bindings.elements.map((element) => element.name.text));
			if (
				clause?.name === undefined &&
				bindings.elements.length > 0 &&
				bindings.elements.every((element) => element.isTypeOnly)
			) {
				typeOnly = true;
			}
		}
	}
	const module = node.moduleSpecifier.text;
	return {
		module,
		names: names.length === 0 ? [module] : names,
		line: lineOf(sourceFile, node.getStart(sourceFile)),
		typeOnly,
	};
}

/**
 * Parse TypeScript or JavaScript into a SourceOutline.
 *
 * @param fileName - Used for the script kind and in diagnostics
 * @returns left(first syntax error text) when the file does not parse
 *
 * @pure true
 * @complexity O(m) where m = |nodes|
 */
export function outlineTypeScript(
	content: string,
	fileName: string,
): Either.Either<SourceOutline, string> {
	const normalized = content.replace(/\r\n/g, "\n");
	const syntax = ts.transpileModule(normalized, {
		fileName,
		reportDiagnostics: true,
		compilerOptions: { jsx: ts.JsxEmit.Preserve },
	}).diagnostics;
	const firstError = syntax?.find(
		(d) => d.category === ts.DiagnosticCategory.Error && d.file !== undefined,
	);
	if (firstError !== undefined) {
		const position =
			firstError.file !== undefined && firstError.start !== undefined
				? ` (line ${lineOf(firstError.file, firstError.start)})`
				: "";
		return Either.left(`${ts.flattenDiagnosticMessageText(firstError.messageText, "\n")}${position}`);
	}

	const sourceFile = ts.createSourceFile(
		fileName,
		normalized,
		ts.ScriptTarget.Latest,
		/* setParentNodes */ true,
		resolveScriptKind(fileName),
	);

	const functions: FunctionOutline[] = [];
	const classes: ClassOutline[] = [];
	const imports: ImportOutline[] = [];
	const calls: CallOutline[] = [];

	const visit = (node: ts.Node): void => {
		if (isFunctionLike(node)) {
			functions.push({
				name: functionName(node),
				line: lineOf(sourceFile, node.getStart(sourceFile)),
				endLine: lineOf(sourceFile, node.getEnd()),
				params: parameterNames(node, sourceFile),
				constructs: node.body === undefined ? [] : collectConstructs(node.body, sourceFile),
			});
		} else if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
			classes.push(classOutline(node, sourceFile));
		} else if (ts.isImportDeclaration(node)) {
			const entry = importOutline(node, sourceFile);
			if (entry !== undefined) imports.push(entry);
		} else if (
			ts.isExportDeclaration(node) &&
			node.moduleSpecifier !== undefined &&
			ts.isStringLiteral(node.moduleSpecifier)
		) {
			imports.push({
				module: node.moduleSpecifier.text,
				names: [node.moduleSpecifier.text],
				line: lineOf(sourceFile, node.getStart(sourceFile)),
				typeOnly: node.isTypeOnly,
			});
		} else if (ts.isCallExpression(node)) {
			const callee = calleeName(node.expression);
			const [firstArg] = node.arguments;
			if (callee === "require" && firstArg !== undefined && ts.isStringLiteral(firstArg)) {
				imports.push({
					module: firstArg.text,
					names: [firstArg.text],
					line: lineOf(sourceFile, node.getStart(sourceFile)),
					typeOnly: false,
				});
			} else if (callee !== undefined) {
				calls.push({ callee, line: lineOf(sourceFile, node.getStart(sourceFile)) });
			}
		}
		ts.forEachChild(node, visit);
	};
	visit(sourceFile);

	return Either.right({
		language: "typescript",
		lines: normalized.split("\n"),
		commentPrefixes: ["//", "/*", "*"],
		functions,
		classes,
		imports,
		calls,
	});
}
