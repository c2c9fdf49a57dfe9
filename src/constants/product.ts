export const PRODUCT_NAME = 'Haven'
export const PRODUCT_COMMAND = 'haven'
export const CONFIG_BASE_DIR = '.haven'
export const CONFIG_FILE = 'config.json'
export const ADK_APP_NAME = 'HavenAssistant'

export const ASCII_LOGO = [
  ' _   _    ___   __     __  _____   _   _ ',
  '| | | |  / _ \\  \\ \\   / / | ____| | \\ | |',
  '| |_| | / /_\\ \\  \\ \\ / /  |  _|   |  \\| |',
  '|  _  | |  _  |   \\ V /   | |___  | |\\  |',
  '|_| |_| |_| |_|    \\_/    |_____| |_| \\_|',
].join('\n')
