// Trend Agent Nodes

export * from './contextualize-node';
export * from './proto-cluster-node';
export * from './evolve-node';
export * from './evaluate-node';
export * from './store-node';
