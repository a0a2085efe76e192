import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk'
import { Verdict } from '@kconfig-audit/engine'

export interface Theme {
  readonly amber: ChalkInstance
  readonly green: ChalkInstance
  readonly red:   ChalkInstance
}

export function createTheme(level: ColorSupportLevel): Theme {
  const c = new Chalk({ level })
  return {
    amber: c.hex('#D4880A'),
    green: c.hex('#81C784'),
    red:   c.hex('#CF6679'),
  }
}

/** No escape sequences. Used for JSON mode, pipes and tests. */
export const plainTheme: Theme = createTheme(0)

export const verdictColor = (theme: Theme, verdict: Verdict): ChalkInstance => {
  switch (verdict) {
    case Verdict.Ok:      return theme.green
    case Verdict.Fail:    return theme.red
    case Verdict.Unknown: return theme.amber
  }
}
