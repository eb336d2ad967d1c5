export * from './errors/index.js';
export * from './rules/index.js';
export {
  Observable,
  type ObservableKey,
  type ObservableLifecycle,
  type ObservableOptions,
  type PropertyDescriptor,
  type PropertyDescriptors,
} from './observable/observable.js';
export {
  ValidatableValue,
  type ValidatableField,
  type ValidatableProperty,
  type ValidatableState,
  type ValidatableValueOptions,
} from './validatable/validatable-value.js';
export { Validator, type SubmitAction, type SubmitOptions, type ValidatorOptions } from './validator/validator.js';
export {
  AsyncCommand,
  type AsyncCommandOptions,
  type AsyncCommandProperty,
  type AsyncCommandState,
} from './command/async-command.js';
export { sameElements, structuralEquals, type Equality } from './utils/equality.js';
