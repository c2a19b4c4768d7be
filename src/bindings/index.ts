// Parameter bindings for executions
export type { Execution, ExecutionParameter, ParameterBinding } from './types.js';
export type { ParameterBinder, ParameterBinderRegistry } from './parameter-binder.js';
export { createParameterBinder, createParameterBinderRegistry } from './parameter-binder.js';
