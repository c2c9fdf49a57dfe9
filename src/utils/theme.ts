export type Theme = {
  haven: string
  text: string
  secondaryText: string
  secondaryBorder: string
  success: string
  warning: string
  error: string
  user: string
}

const DARK_THEME: Theme = {
  haven: '#7FB8A4',
  text: '#E6E6E6',
  secondaryText: '#8A8A8A',
  secondaryBorder: '#5C5C5C',
  success: '#5FD068',
  warning: '#E5C07B',
  error: '#E06C75',
  user: '#A9C7FF',
}

const LIGHT_THEME: Theme = {
  haven: '#2F7A62',
  text: '#1F1F1F',
  secondaryText: '#6B6B6B',
  secondaryBorder: '#B0B0B0',
  success: '#2E8B3A',
  warning: '#A36A00',
  error: '#B3261E',
  user: '#2D5BB8',
}

export function getTheme(): Theme {
  return process.env.HAVEN_THEME?.trim().toLowerCase() === 'light'
    ? LIGHT_THEME
    : DARK_THEME
}
