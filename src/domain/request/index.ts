export type {
  ResilientRequest,
  InvocationContext,
  Invoker,
  CallOptions,
} from './IRequest';
