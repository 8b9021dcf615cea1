export {
  loadStack,
  parseStackDefinition,
  type LoadStackOptions,
  type Stack,
  type StackDefinition,
} from './stack-loader.js';
