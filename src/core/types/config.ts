import { ModuleKind, ScriptTarget } from 'ts-morph';

/** Options that customize the output of the generated code. */
export interface GeneratorConfigOptions {
    /**
     * Casing applied to method names derived from the HTTP method and path.
     * - 'snake': `get_users_id` (default)
     * - 'camel': `getUsersId`
     * Explicit `fn_name` values are kept as written.
     */
    methodNameStyle?: 'snake' | 'camel';
    /** Module specifier the generated providers import referenced types from, e.g. `'../models.js'`. */
    typesModule?: string;
    /**
     * Path to a TypeScript file whose exported types form the type registry.
     * Every type name a declaration references must be declared there.
     */
    typeRegistry?: string;
    /** Extra type names accepted by the registry check. */
    knownTypes?: string[];
    /** Extension appended to relative imports between generated files. Defaults to '.js'. */
    importExtension?: '.js' | '.ts' | '';
    /** If true, writes an `index.ts` re-exporting every provider. Defaults to true. */
    emitIndex?: boolean;
}

/** The main configuration object for the entire generation process. */
export interface GeneratorConfig {
    /** Path of the declaration file (`.provider` DSL, `.json`, `.yaml` or `.yml`). */
    input: string;
    /** The directory where the generated code will be saved. */
    output: string;
    /** Fine-grained options for customizing the generated code. */
    options: GeneratorConfigOptions;
    /** ts-morph compiler options for the generated project. */
    compilerOptions?: {
        declaration?: boolean;
        target?: ScriptTarget;
        module?: ModuleKind;
        strict?: boolean;
    };
}
