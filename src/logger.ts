export interface Logger {
  log(message: string): void;
  success(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  success: (message) => console.log(`  ✅ ${message}`),
  error: (message) => console.error(`❌ ${message}`)
};

// Tests and library callers that want no output
export const silentLogger: Logger = {
  log: () => {},
  success: () => {},
  error: () => {}
};
