export { SiteLoader, type SiteLoaderDependencies } from './site-loader.engine.js';
export { LintEngine, compareDiagnostics, type LintEngineDependencies } from './lint.engine.js';
