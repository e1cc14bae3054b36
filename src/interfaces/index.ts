export * from './json-value.interface'
export * from './config-node.interface'
export * from './finding.interface'
export * from './scan-options.interface'
