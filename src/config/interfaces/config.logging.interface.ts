export interface ConfigLoggingInterface {
  level: string;
  pretty: boolean;
}
