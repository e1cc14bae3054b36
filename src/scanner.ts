import { existsSync } from 'node:fs'

import { NotFoundError, UsageError } from './errors'
import type { ConfigFormat, iFinding, iScanOptions, ScanOutcome } from './interfaces'
import { detectFormat, loadConfig, loadTable, resolveFormat } from './loader'
import { findDeprecated } from './matcher'
import { formatFindings, formatJson } from './reporter'

export class DeprecationScanner {
  private findings: iFinding[] = []

  constructor(private readonly options: iScanOptions) {}

  /**
   * Loads both inputs and runs the matcher. Any load error ends the scan
   * before matching; nothing is thrown past this method.
   */
  scan = (): ScanOutcome => {
    this.findings = []

    try {
      // 1. both inputs must exist before anything is read
      this.assertExists('Configuration file', this.options.configFile)
      this.assertExists('Deprecated features file', this.options.deprecatedFeaturesFile)

      // 2. load the table, then the configuration tree
      const table = loadTable(this.options.deprecatedFeaturesFile)
      const tree = loadConfig(this.options.configFile, this.resolveConfigType(), this.options.maxDepth)

      // 3. match
      this.findings = findDeprecated(tree, table)
    } catch (error) {
      return { kind: 'load-failure', error }
    }

    return { kind: 'scanned', findings: this.findings }
  }

  private assertExists = (
    label: string,
    file: string
  ) => {
    if (!existsSync(file)) {
      throw new NotFoundError(label, file)
    }
  }

  private resolveConfigType = (): ConfigFormat => {
    const { configType, configFile } = this.options

    if (configType) {
      return resolveFormat(configType, configFile)
    }

    const detected = detectFormat(configFile)

    if (!detected) {
      throw new UsageError(`Cannot infer the configuration type of ${configFile}; pass --config-type yaml|json`)
    }

    return detected
  }

  printFindings = () => {
    if (this.options.json) {
      console.log(formatJson(this.findings))
      return
    }

    const [header, ...blocks] = formatFindings(this.findings, { color: this.options.color })

    if (!this.findings.length) {
      console.log(header)
      return
    }

    console.log(`\n${header}\n`)
    blocks.forEach((line) => console.log(line))
  }
}
