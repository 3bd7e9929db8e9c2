export type Logger = (message: string) => void;

export function createLogger(scope: string, detail?: string): Logger {
  return (message: string) => console.log(`[${scope}${detail ? `:${detail}` : ''}] ${message}`);
}
