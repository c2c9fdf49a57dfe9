import pkg from '../../package.json'

export const MACRO = {
  VERSION: pkg.version,
  DESCRIPTION: pkg.description,
}
