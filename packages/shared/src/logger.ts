import pc from 'picocolors';

export const log = {
  info: (msg: string) => console.log(`${pc.cyan('[hearth]')} ${msg}`),
  success: (msg: string) => console.log(`${pc.green('[hearth]')} ${msg}`),
  warn: (msg: string) => console.warn(`${pc.yellow('[hearth]')} ${msg}`),
  error: (msg: string) => console.error(`${pc.red('[hearth]')} ${msg}`),
};
