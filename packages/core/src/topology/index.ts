export { Topology } from './topology.js';
export type { TopologyVariant, LabelScope } from './topology.js';
