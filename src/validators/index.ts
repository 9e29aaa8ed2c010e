export { CodeValidatorRegistry, createDefaultValidatorRegistry } from './validator-registry.js';
export { JsonValidator, JsoncValidator, stripJsonComments } from './json.validator.js';
export { YamlValidator } from './yaml.validator.js';
export { XmlValidator } from './xml.validator.js';
export { CSharpValidator } from './csharp.validator.js';
export type { CodeValidator, CodeValidationResult } from '../types/validator.types.js';
