import { IndentationText, ModuleKind, ModuleResolutionKind, Project, ScriptTarget } from 'ts-morph';
import ts from 'typescript';
import { generateFromConfig, TestGeneratorConfig } from '@src/index.js';
import { GeneratorConfig, GeneratorConfigOptions, ResolvedProviderDescriptor } from '@src/core/types.js';

export const OUTPUT_DIR = '/generated';

/**
 * Creates a ts-morph project backed by an in-memory file system, so tests never touch the disk.
 */
export function createTestProject(): Project {
    return new Project({
        useInMemoryFileSystem: true,
        manipulationSettings: { indentationText: IndentationText.FourSpaces },
        compilerOptions: {
            target: ScriptTarget.ES2022,
            module: ModuleKind.ESNext,
            moduleResolution: ModuleResolutionKind.Bundler,
            strict: true,
            noEmit: true,
        },
    });
}

export interface GeneratorRun {
    project: Project;
    providers: ResolvedProviderDescriptor[];
}

/**
 * Runs the full pipeline on a declaration held in memory.
 * @param source The declaration text.
 * @param options Generator options.
 * @param testConfig Extra test inputs, e.g. the file name that selects the format.
 * @param project A project prepared by the caller, e.g. holding a type registry file.
 */
export async function runGenerator(
    source: string,
    options: GeneratorConfigOptions = {},
    testConfig: Omit<TestGeneratorConfig, 'source'> = {},
    project: Project = createTestProject(),
): Promise<GeneratorRun> {
    const config: GeneratorConfig = {
        input: testConfig.fileName ?? '/api.provider',
        output: OUTPUT_DIR,
        options,
    };
    const providers = await generateFromConfig(config, project, { source, ...testConfig });
    return { project, providers };
}

/**
 * Transpiles a generated module to CommonJS and evaluates it.
 * @param modules The modules its relative imports resolve to, keyed by specifier.
 */
export function evaluateModule(text: string, modules: Record<string, unknown> = {}): Record<string, any> {
    const jsCode = ts.transpile(text, { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.CommonJS });
    const moduleExports: Record<string, any> = {};
    const requireStub = (specifier: string): unknown => {
        if (!(specifier in modules)) throw new Error(`Unexpected import of ${specifier}`);
        return modules[specifier];
    };
    new Function('exports', 'require', jsCode)(moduleExports, requireStub);
    return moduleExports;
}

export function loadRuntime(project: Project, outputDir: string = OUTPUT_DIR): Record<string, any> {
    return evaluateModule(project.getSourceFileOrThrow(`${outputDir}/provider-runtime.ts`).getFullText());
}

/**
 * Loads a generated provider module whose transport sends every request to `fetchStub`.
 */
export function loadProvider(
    project: Project,
    fileName: string,
    fetchStub: typeof fetch,
    outputDir: string = OUTPUT_DIR,
): { runtime: Record<string, any>; providerModule: Record<string, any> } {
    const runtime = loadRuntime(project, outputDir);
    const stubbedRuntime = { ...runtime, createTransport: () => runtime.createTransport(fetchStub) };
    const providerModule = evaluateModule(project.getSourceFileOrThrow(`${outputDir}/${fileName}`).getFullText(), {
        './provider-runtime.js': stubbedRuntime,
    });
    return { runtime, providerModule };
}

export interface RecordedRequest {
    url: string;
    method: string;
    headers: Headers;
    body?: string;
}

/**
 * An in-process stand-in for `fetch` that records each request and answers with `respond`.
 */
export function createFetchStub(respond: (request: RecordedRequest, signal?: AbortSignal) => Response | Promise<Response>) {
    const requests: RecordedRequest[] = [];
    const fetchStub = async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
        const request: RecordedRequest = {
            url: String(input),
            method: init.method ?? 'GET',
            headers: new Headers(init.headers),
            body: typeof init.body === 'string' ? init.body : undefined,
        };
        requests.push(request);
        return respond(request, init.signal ?? undefined);
    };
    return { fetch: fetchStub as typeof fetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}
