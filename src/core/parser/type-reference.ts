import { ts } from 'ts-morph';
import { BUILTIN_TYPE_NAMES } from '../constants.js';
import { EndpointDescriptor, TypeReference } from '../types/index.js';

const TYPE_ALIAS_NAME = '__ProviderTypeReference';

function wrap(text: string): string {
    return `type ${TYPE_ALIAS_NAME} = ${text};`;
}

/**
 * Checks that `text` is a single, syntactically valid TypeScript type expression.
 * Names are not resolved; `Usr[]` is valid even if nothing declares `Usr`.
 */
export function isValidTypeReference(text: string): boolean {
    if (!text.trim()) return false;

    const { diagnostics } = ts.transpileModule(`${wrap(text)}\nexport {};`, {
        reportDiagnostics: true,
        compilerOptions: { target: ts.ScriptTarget.ES2022, noLib: true },
    });
    if (diagnostics && diagnostics.length > 0) return false;

    const sourceFile = ts.createSourceFile('type-reference.ts', wrap(text), ts.ScriptTarget.ES2022, true);
    return sourceFile.statements.length === 1 && ts.isTypeAliasDeclaration(sourceFile.statements[0]);
}

/**
 * Checks that `text` can follow `implements`: a possibly qualified name with optional
 * type arguments, such as `UserReader` or `Api.Reader<User>`.
 */
export function isImplementableReference(text: string): boolean {
    if (!isValidTypeReference(text)) return false;

    const sourceFile = ts.createSourceFile('type-reference.ts', wrap(text), ts.ScriptTarget.ES2022, true);
    const [statement] = sourceFile.statements;
    return ts.isTypeAliasDeclaration(statement) && ts.isTypeReferenceNode(statement.type);
}

function leftmostName(name: ts.EntityName): string {
    return ts.isIdentifier(name) ? name.text : leftmostName(name.left);
}

/**
 * Collects the names a type expression refers to, e.g. `Page<User> | Models.Error` gives
 * `['Models', 'Page', 'User']`. Built-in globals and type parameters declared inside the
 * expression are left out. The result is sorted and free of duplicates.
 */
export function collectTypeNames(text: string): string[] {
    const sourceFile = ts.createSourceFile('type-reference.ts', wrap(text), ts.ScriptTarget.ES2022, true);
    const referenced = new Set<string>();
    const declared = new Set<string>();

    const visit = (node: ts.Node): void => {
        if (ts.isTypeReferenceNode(node)) {
            referenced.add(leftmostName(node.typeName));
        } else if (ts.isTypeQueryNode(node)) {
            referenced.add(leftmostName(node.exprName));
        } else if (ts.isTypeParameterDeclaration(node)) {
            declared.add(node.name.text);
        }
        ts.forEachChild(node, visit);
    };
    ts.forEachChild(sourceFile, visit);

    return [...referenced].filter(name => !declared.has(name) && !BUILTIN_TYPE_NAMES.has(name)).sort();
}

/**
 * The type references an endpoint carries, in parameter order followed by the response type
 * and the implemented interface.
 */
export function getEndpointTypeReferences(endpoint: EndpointDescriptor): TypeReference[] {
    return [
        endpoint.pathParams,
        endpoint.req,
        endpoint.headers,
        endpoint.queryParams,
        endpoint.res,
        endpoint.implements,
    ].filter((ref): ref is TypeReference => ref !== undefined);
}
