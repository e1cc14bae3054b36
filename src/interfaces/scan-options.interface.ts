import type { iFinding } from './finding.interface'

export interface iScanOptions {
  configFile: string
  // inferred from the file extension when omitted
  configType?: string
  deprecatedFeaturesFile: string
  json: boolean
  color: boolean
  maxDepth: number
}

export type ScanOutcome =
  | { kind: 'load-failure', error: unknown }
  | { kind: 'scanned', findings: iFinding[] }

export type ExitStatus =
  | { status: 'load-failure', code: 1 }
  | { status: 'clean', code: 0 }
  | { status: 'deprecations-found', code: 2 }
