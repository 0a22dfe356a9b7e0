/** Options accepted by every command */
export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}
