export const REPORT_MODES = ['verbose', 'json', 'show_ok', 'show_fail'] as const

export type ReportMode = typeof REPORT_MODES[number]

export const isReportMode = (value: string): value is ReportMode =>
  REPORT_MODES.some((mode) => mode === value)
