export interface ConfigApiInterface {
  port: number;
  host: string;
}
