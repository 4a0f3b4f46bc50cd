// ANSI color codes
export const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
};

export interface Logger {
  success(msg: string): void;
  error(msg: string): void;
  warning(msg: string): void;
  info(msg: string): void;
  processing(msg: string): void;
  music(msg: string): void;
  stats(msg: string): void;
  header(msg: string): void;
  dim(msg: string): void;
}

export const colorLog: Logger = {
  success: (msg: string) => console.log(`${colors.green}✅ ${msg}${colors.reset}`),
  error: (msg: string) => console.error(`${colors.red}❌ ${msg}${colors.reset}`),
  warning: (msg: string) => console.log(`${colors.yellow}⚠️  ${msg}${colors.reset}`),
  info: (msg: string) => console.log(`${colors.blue}ℹ️  ${msg}${colors.reset}`),
  processing: (msg: string) => console.log(`${colors.cyan}🔄 ${msg}${colors.reset}`),
  music: (msg: string) => console.log(`${colors.magenta}🎵 ${msg}${colors.reset}`),
  stats: (msg: string) => console.log(`${colors.bright}${colors.white}📊 ${msg}${colors.reset}`),
  header: (msg: string) => console.log(`${colors.bright}${colors.cyan}${msg}${colors.reset}`),
  dim: (msg: string) => console.log(`${colors.dim}${colors.gray}${msg}${colors.reset}`),
};

const noop = () => {};

export const silentLogger: Logger = {
  success: noop,
  error: noop,
  warning: noop,
  info: noop,
  processing: noop,
  music: noop,
  stats: noop,
  header: noop,
  dim: noop,
};
