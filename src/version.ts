export const VERSION = '0.0.1'

export function version(): string {
  return VERSION
}
