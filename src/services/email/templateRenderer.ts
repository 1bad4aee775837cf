/**
 * Template Renderer
 *
 * Renders Handlebars templates against a context record in strict mode:
 * every variable the template references must exist in the context.
 *
 * References are checked up front by walking the template AST and looking
 * each root-scope name up in the context; a miss becomes an
 * `UndefinedVariableError` before anything is rendered. Handlebars' own
 * strict mode stays on for lookups the walk cannot see (nested properties),
 * and its exceptions are translated into the same typed errors.
 *
 * Output is not HTML-escaped: substituted values are inserted verbatim, which
 * is what lets Markdown-generated HTML flow into the HTML template.
 *
 * @module services/email/templateRenderer
 */

import Handlebars from 'handlebars';
import { TEMPLATE_HELPERS } from './templateHelpers';
import { TemplateSyntaxError, UndefinedVariableError } from './errors';

export type TemplateContext = Readonly<Record<string, unknown>>;

// ========================================
// CONTEXT LOOKUP
// ========================================

export const NOT_FOUND: unique symbol = Symbol('NOT_FOUND');
export type LookupResult = unknown | typeof NOT_FOUND;

export function lookupVariable(context: TemplateContext, name: string): LookupResult {
  return Object.prototype.hasOwnProperty.call(context, name) ? context[name] : NOT_FOUND;
}

// ========================================
// REFERENCE COLLECTION
// ========================================

type BlockNode = Parameters<Handlebars.Visitor['BlockStatement']>[0];
type MustacheNode = Parameters<Handlebars.Visitor['MustacheStatement']>[0];
type SubExpressionNode = Parameters<Handlebars.Visitor['SubExpression']>[0];
type PathNode = Parameters<Handlebars.Visitor['PathExpression']>[0];

// Block helpers whose body runs against a different context.
const SCOPE_CHANGING_HELPERS = new Set(['each', 'with']);
// Helpers whose arguments may legitimately be missing.
const LENIENT_HELPERS = new Set(['default']);

function pathName(node: unknown): string | undefined {
  if (typeof node !== 'object' || node === null) return undefined;
  if (!('type' in node) || node.type !== 'PathExpression') return undefined;
  return 'original' in node && typeof node.original === 'string' ? node.original : undefined;
}

/**
 * Collects the names a template reads from the root context.
 */
class RootReferenceCollector extends Handlebars.Visitor {
  readonly references: string[] = [];
  private nestedScopes = 0;
  private lenientArgs = 0;

  constructor(private readonly helperNames: ReadonlySet<string>) {
    super();
  }

  PathExpression(path: PathNode): void {
    if (this.nestedScopes > 0 || this.lenientArgs > 0) return;
    if (path.data || path.depth > 0 || path.parts.length === 0) return;
    this.references.push(path.parts[0]);
  }

  MustacheStatement(mustache: MustacheNode): void {
    this.visitCall(mustache.path, mustache.params, mustache.hash);
  }

  SubExpression(sexpr: SubExpressionNode): void {
    this.visitCall(sexpr.path, sexpr.params, sexpr.hash);
  }

  BlockStatement(block: BlockNode): void {
    const name = pathName(block.path);
    this.visitCall(block.path, block.params, block.hash, true);

    const changesScope = name !== undefined && SCOPE_CHANGING_HELPERS.has(name);
    if (changesScope) this.nestedScopes++;
    this.accept(block.program);
    if (changesScope) this.nestedScopes--;
    this.accept(block.inverse);
  }

  private visitCall(
    callee: MustacheNode['path'],
    params: MustacheNode['params'],
    hash: MustacheNode['hash'],
    isBlock = false
  ): void {
    const name = pathName(callee);
    const isHelperCall = isBlock || params.length > 0 || Boolean(hash);

    if (!isHelperCall && !(name && this.helperNames.has(name))) {
      this.accept(callee);
    }

    const lenient = name !== undefined && LENIENT_HELPERS.has(name);
    if (lenient) this.lenientArgs++;
    this.acceptArray(params);
    this.accept(hash);
    if (lenient) this.lenientArgs--;
  }
}

// ========================================
// RENDERING
// ========================================

type TemplateEngine = ReturnType<typeof Handlebars.create>;

function createEngine(helperNames: ReadonlySet<string>): TemplateEngine {
  const engine = Handlebars.create();
  for (const name of helperNames) {
    engine.registerHelper(name, TEMPLATE_HELPERS[name]);
  }
  return engine;
}

const ALL_HELPERS: ReadonlySet<string> = new Set(Object.keys(TEMPLATE_HELPERS));
const defaultEngine = createEngine(ALL_HELPERS);

/**
 * A context key named like a helper (a CSV column called `title`, say) must
 * resolve to the value, so such helpers are left out for that render.
 */
function helpersFor(context: TemplateContext): ReadonlySet<string> {
  const shadowed = [...ALL_HELPERS].filter((name) => lookupVariable(context, name) !== NOT_FOUND);
  if (shadowed.length === 0) return ALL_HELPERS;
  return new Set([...ALL_HELPERS].filter((name) => !shadowed.includes(name)));
}

const UNDEFINED_PATTERN = /^"([^"]+)" not defined in/;

function translateEngineError(error: unknown): Error {
  if (error instanceof Error) {
    const match = UNDEFINED_PATTERN.exec(error.message);
    if (match) return new UndefinedVariableError(match[1]);
    return new TemplateSyntaxError(error.message);
  }
  return new TemplateSyntaxError(String(error));
}

function parseTemplate(body: string): ReturnType<typeof Handlebars.parse> {
  try {
    return defaultEngine.parse(body);
  } catch (error) {
    throw translateEngineError(error);
  }
}

/**
 * Names of all root-context variables a template reads.
 *
 * @throws TemplateSyntaxError on malformed template syntax
 */
export function collectVariableReferences(
  body: string,
  helperNames: ReadonlySet<string> = ALL_HELPERS
): string[] {
  const collector = new RootReferenceCollector(helperNames);
  collector.accept(parseTemplate(body));
  return [...new Set(collector.references)];
}

/**
 * Render `body` against `context`.
 *
 * @throws UndefinedVariableError when the body references a missing variable
 * @throws TemplateSyntaxError on malformed template syntax
 */
export function renderTemplate(body: string, context: TemplateContext): string {
  if (!body) return '';

  const helperNames = helpersFor(context);
  for (const name of collectVariableReferences(body, helperNames)) {
    if (lookupVariable(context, name) === NOT_FOUND) {
      throw new UndefinedVariableError(name);
    }
  }

  const engine = helperNames === ALL_HELPERS ? defaultEngine : createEngine(helperNames);
  try {
    const template = engine.compile(body, { strict: true, noEscape: true });
    return template({ ...context });
  } catch (error) {
    throw translateEngineError(error);
  }
}
