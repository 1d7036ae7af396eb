import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogValue = string | number | boolean | object

/**
 * Writes a structured log line to stderr. stdout is reserved for the
 * provider response so the CLI output stays machine readable.
 */
export const log = (
  message: string | { message: string; [key: string]: LogValue },
) => {
  let logMessage: {
    message: string
    app: string
    version: string
    [key: string]: LogValue
  }
  if (typeof message === 'string') {
    logMessage = {
      message,
      app: name,
      version,
    }
  } else {
    logMessage = {
      ...message,
      app: name,
      version,
    }
  }
  console.error(logMessage)
}
