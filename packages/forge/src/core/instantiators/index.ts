export { CallableInstantiator } from './callable.js';
export { DictInstantiator } from './dict.js';
export { ListInstantiator } from './list.js';
export { ReferenceInstantiator } from './reference.js';
export { DECLINED, accept } from './instantiator.js';
export type { BuildAttempt, Instantiator, InstantiatorKind, NodeBuilder } from './instantiator.js';
