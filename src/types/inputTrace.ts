export interface InputTrace {
  readonly path: string;
  readonly sortKey: number;
  readonly basename: string;
}

export interface CollectorEndpoint {
  host: string;
  port: number;
}
