/**
 * Capture Verifier
 *
 * Static pass over TypeScript sources. At every call of a block entry point
 * (`checkNoEnv`, `checkWithEnv`, `checkThunk`, `Block.of`, `Block.thunk`),
 * however it is imported or renamed, it requires a function literal of the
 * right shape, and rejects every reference
 * in that literal to a binding of an enclosing scope. Allowed are bindings
 * declared inside the literal and singletons: module-level declarations,
 * possibly nested in up to two namespaces, and ambient globals.
 *
 * Usage:
 *   const verifier = new CaptureVerifier(program, { strict: true });
 *   const diagnostics = verifier.verifyProgram();
 */

import * as ts from "typescript";
import { CaptureDiagnostic, diagnosticAt, sortDiagnostics } from "./diagnostics";
import {
  EntryPointCall,
  EntryPointSite,
  FunctionLiteral,
  asFunctionLiteral,
  callOf,
  calleeSite,
  entryPointName,
  matchEntryPoint,
  returnedLiteral,
} from "./entry-points";
import { argumentsBinder, isSingleton, isWithin, thisBinder } from "./owners";
import { Reference, collectReferences, isTypeOnly } from "./references";

export interface VerifierOptions {
  /**
   * Report shapes the pass cannot see through (`eval`, `with`, unresolved
   * names) instead of skipping them.
   */
  strict?: boolean;
  /** Receives a line for every skipped shape */
  log?: (message: string) => void;
}

export class CaptureVerifier {
  private readonly checker: ts.TypeChecker;
  private readonly strict: boolean;
  private readonly log: (message: string) => void;

  constructor(
    private readonly program: ts.Program,
    options: VerifierOptions = {}
  ) {
    this.checker = program.getTypeChecker();
    this.strict = options.strict ?? false;
    this.log = options.log ?? (() => {});
  }

  /**
   * Checks every source file of the program that is neither a declaration
   * file nor part of an external library.
   */
  verifyProgram(fileNames?: readonly string[]): CaptureDiagnostic[] {
    const wanted = fileNames === undefined ? undefined : new Set(fileNames);
    const diagnostics: CaptureDiagnostic[] = [];
    for (const sourceFile of this.program.getSourceFiles()) {
      if (sourceFile.isDeclarationFile || this.program.isSourceFileFromExternalLibrary(sourceFile)) continue;
      if (wanted !== undefined && !wanted.has(sourceFile.fileName)) continue;
      diagnostics.push(...this.verifyFile(sourceFile));
    }
    return sortDiagnostics(diagnostics);
  }

  /**
   * Checks every reference to an entry point in the file. Calls are checked
   * for their literal; any other use of an entry point (an alias, a callback
   * argument, a property value) is reported, since the checker cannot follow
   * the literal to where the value is eventually called.
   */
  verifyFile(sourceFile: ts.SourceFile): CaptureDiagnostic[] {
    const diagnostics: CaptureDiagnostic[] = [];

    const visit = (node: ts.Node): void => {
      if (isTypeOnly(node) || this.isEntryPointDeclaration(node)) return;

      const site = asSite(node);
      const callee = site && this.entryPointAt(site);
      if (site && callee !== undefined) {
        const call = callOf(site);
        if (call) {
          diagnostics.push(...this.verifyEntryCall(call, callee));
        } else {
          diagnostics.push(
            diagnosticAt(site, "NotALiteral", `\`${callee}\` must be called directly with a function literal`)
          );
        }
      }

      ts.forEachChild(node, visit);
    };
    visit(sourceFile);

    return diagnostics;
  }

  /**
   * Diagnostics for one call; empty when the call is not an entry point or
   * its literal is clean.
   */
  verifyCall(call: ts.CallExpression): CaptureDiagnostic[] {
    const site = calleeSite(call.expression);
    if (site === undefined) return [];
    const callee = this.entryPointAt(site);
    if (callee === undefined || this.isInsideEntryPointDeclaration(call)) {
      return [];
    }
    return this.verifyEntryCall(call, callee);
  }

  private verifyEntryCall(call: ts.CallExpression, callee: string): CaptureDiagnostic[] {
    const entry = matchEntryPoint(callee, call);
    if (entry === undefined) {
      return [diagnosticAt(call, "NotALiteral", `\`${callee}\` must be called with a function literal`)];
    }

    const literal = this.literalOf(entry);
    if (literal === undefined) {
      const message =
        entry.shape === "curried"
          ? `Argument of \`${entry.callee}\` must be a curried function literal of the form \`x => env => ...\``
          : `Argument of \`${entry.callee}\` must be a function literal`;
      return [diagnosticAt(entry.argument, "NotALiteral", message)];
    }

    return this.verifyLiteral(literal);
  }

  private literalOf(entry: EntryPointCall): FunctionLiteral | undefined {
    const literal = asFunctionLiteral(entry.argument);
    if (literal === undefined) return undefined;
    if (entry.shape === "curried" && returnedLiteral(literal) === undefined) return undefined;
    return literal;
  }

  // ==========================================================================
  // Entry point resolution
  // ==========================================================================

  /**
   * The entry point `site` refers to, following import aliases. Names that
   * declare something (an import specifier, a variable) are not references.
   */
  private entryPointAt(site: EntryPointSite): string | undefined {
    const parent = site.parent;
    if (ts.isImportSpecifier(parent) || ts.isExportSpecifier(parent) || ts.isQualifiedName(parent)) {
      return undefined;
    }

    let symbol: ts.Symbol | undefined;
    if (ts.isShorthandPropertyAssignment(parent) && parent.name === site) {
      symbol = this.checker.getShorthandAssignmentValueSymbol(parent);
    } else if (
      ts.isBindingElement(parent) &&
      parent.name === site &&
      parent.propertyName === undefined &&
      ts.isObjectBindingPattern(parent.parent)
    ) {
      // `const { checkNoEnv } = blocks` reads a property
      symbol = this.checker.getPropertyOfType(this.checker.getTypeAtLocation(parent.parent), site.text);
    } else {
      symbol = this.checker.getSymbolAtLocation(site);
      if (symbol?.declarations?.some((declaration) => ts.getNameOfDeclaration(declaration) === site)) {
        return undefined;
      }
    }

    if (symbol === undefined) return undefined;
    if (symbol.flags & ts.SymbolFlags.Alias) {
      symbol = this.checker.getAliasedSymbol(symbol);
    }
    return entryPointName(symbol);
  }

  /**
   * The library's own declaration of an entry point. Calls inside it forward
   * a parameter and are checked at the outer call sites instead.
   */
  private isEntryPointDeclaration(node: ts.Node): boolean {
    if (!ts.isFunctionDeclaration(node) && !ts.isMethodDeclaration(node)) return false;
    if (node.name === undefined) return false;
    const symbol = this.checker.getSymbolAtLocation(node.name);
    return symbol !== undefined && entryPointName(symbol) !== undefined;
  }

  private isInsideEntryPointDeclaration(node: ts.Node): boolean {
    for (let current = node.parent; current; current = current.parent) {
      if (this.isEntryPointDeclaration(current)) return true;
    }
    return false;
  }

  // ==========================================================================
  // Capture check
  // ==========================================================================

  verifyLiteral(literal: FunctionLiteral): CaptureDiagnostic[] {
    const diagnostics: CaptureDiagnostic[] = [];
    for (const reference of collectReferences(literal)) {
      const diagnostic = this.checkReference(reference, literal);
      if (diagnostic) diagnostics.push(diagnostic);
    }
    return diagnostics;
  }

  private checkReference(reference: Reference, literal: FunctionLiteral): CaptureDiagnostic | undefined {
    switch (reference.kind) {
      case "identifier":
        return this.checkIdentifier(reference.node, literal);

      case "this":
      case "super": {
        const binder = thisBinder(reference.node);
        if (binder === undefined || ts.isSourceFile(binder) || isWithin(binder, literal)) {
          return undefined;
        }
        return captureViolation(reference.node, reference.kind);
      }

      case "unverifiable":
        return this.unverifiable(reference.node, `Cannot check captures through ${reference.reason}`);
    }
  }

  private checkIdentifier(id: ts.Identifier, literal: FunctionLiteral): CaptureDiagnostic | undefined {
    const symbol = this.symbolOf(id);
    if (symbol === undefined) {
      return this.unverifiable(id, `Cannot resolve \`${id.text}\``);
    }

    const declarations = symbol.declarations ?? [];
    if (declarations.length === 0) {
      // `arguments` is the only binding without declaration that is not global
      if (id.text === "arguments") {
        const binder = argumentsBinder(id);
        if (binder !== undefined && !ts.isSourceFile(binder) && !isWithin(binder, literal)) {
          return captureViolation(id, id.text);
        }
      }
      return undefined;
    }

    const allowed = declarations.some((declaration) => isWithin(declaration, literal) || isSingleton(declaration));
    return allowed ? undefined : captureViolation(id, id.text);
  }

  private symbolOf(id: ts.Identifier): ts.Symbol | undefined {
    const parent = id.parent;
    if (ts.isShorthandPropertyAssignment(parent) && parent.name === id) {
      return this.checker.getShorthandAssignmentValueSymbol(parent);
    }
    return this.checker.getSymbolAtLocation(id);
  }

  private unverifiable(node: ts.Node, message: string): CaptureDiagnostic | undefined {
    const diagnostic = diagnosticAt(node, "UnverifiableSyntax", message);
    if (this.strict) {
      return diagnostic;
    }
    this.log(`${diagnostic.fileName}:${diagnostic.line}:${diagnostic.column}: skipped: ${message}`);
    return undefined;
  }
}

function asSite(node: ts.Node): EntryPointSite | undefined {
  if (ts.isIdentifier(node)) return node;
  if (ts.isStringLiteralLike(node) && ts.isElementAccessExpression(node.parent) && node.parent.argumentExpression === node) {
    return node;
  }
  return undefined;
}

function captureViolation(node: ts.Node, name: string): CaptureDiagnostic {
  return diagnosticAt(
    node,
    "CaptureViolation",
    `Invalid capture of \`${name}\`. Pass it through the block's environment parameter instead.`,
    name
  );
}
