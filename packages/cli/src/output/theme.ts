import { Chalk, type ChalkInstance } from 'chalk'

export interface Theme {
  readonly heading:  ChalkInstance
  readonly path:     ChalkInstance
  readonly removed:  ChalkInstance
  readonly added:    ChalkInstance
}

/**
 * Build the output palette on a chalk instance.
 *
 * Pass `new Chalk({ level: 0 })` for uncolored output.
 */
export const createTheme = (chalk: ChalkInstance = new Chalk()): Theme => ({
  heading:  chalk.cyan,
  path:     chalk.blue,
  removed:  chalk.red,
  added:    chalk.green,
})

export const t = createTheme()

export const plain = createTheme(new Chalk({ level: 0 }))
