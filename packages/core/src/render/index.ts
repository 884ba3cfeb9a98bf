export { renderTemplate, resolveLoopRows, stringifyValue } from './renderer.js';
export { parseBinding } from './binding.js';
export type { BindingValue, RenderOptions, ResultBinding, Scalar } from './types.js';
