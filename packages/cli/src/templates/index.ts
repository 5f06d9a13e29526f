export { packageJson, tsconfig, gitignore, generatorConfig, PROJECT_VERSION } from './project.js';
export { typesTs, routesTs, translationsTs, mainTs } from './source.js';
export { readme } from './readme.js';
export { sampleApiToml, SAMPLE_API_PATH } from './sampleApi.js';
