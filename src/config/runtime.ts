export type Runtime = {
    dbPath: string;
    verbose: boolean;
    logLevel: string;
};

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const dbPath = (env.LENDING_DB_PATH ?? '').trim() || ':memory:';
    const verbose = env.VERBOSE === '1' || env.DEBUG === '1';
    const logLevel = env.LOG_LEVEL || (verbose ? 'trace' : 'info');
    return { dbPath, verbose, logLevel };
}
