import type { ExitStatus, iFinding, ScanOutcome } from './interfaces'

export interface iFormatOptions {
  color: boolean
}

const paint = (
  code: string,
  text: string,
  { color }: iFormatOptions
): string => {
  return color ? `\x1b[${code}m${text}\x1b[0m` : text
}

export const formatFinding = (
  finding: iFinding,
  index: number,
  options: iFormatOptions
): string[] => {
  return [
    `${index + 1}. FEATURE: ${paint('33', finding.feature, options)}`,
    `   Path: ${paint('36', finding.path, options)}`,
    `   Details: ${paint('31', JSON.stringify(finding.info), options)}`,
    '---'
  ]
}

export const formatFindings = (
  findings: iFinding[],
  options: iFormatOptions
): string[] => {
  if (!findings.length) {
    return ['✅ No deprecated features found in the configuration file.']
  }

  return [
    `⚠️  Found ${findings.length} deprecated feature${findings.length === 1 ? '' : 's'} in the configuration file:`,
    ...findings.flatMap((finding, index) => formatFinding(finding, index, options))
  ]
}

export const formatJson = (
  findings: iFinding[]
): string => {
  return JSON.stringify(findings, null, 2)
}

export const report = (
  outcome: ScanOutcome
): ExitStatus => {
  if (outcome.kind === 'load-failure') {
    return { status: 'load-failure', code: 1 }
  }

  if (!outcome.findings.length) {
    return { status: 'clean', code: 0 }
  }

  return { status: 'deprecations-found', code: 2 }
}
