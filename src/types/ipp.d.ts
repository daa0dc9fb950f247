declare module 'ipp' {
  export type IppValue = string | number | boolean | Date | IppValue[] | { [key: string]: IppValue };

  export type IppGroup = Record<string, IppValue>;

  export interface IppRequest {
    'operation-attributes-tag'?: IppGroup;
    'job-attributes-tag'?: IppGroup;
    data?: Buffer;
  }

  export interface IppResponse {
    version?: string;
    statusCode?: string;
    id?: number;
    'operation-attributes-tag'?: IppGroup;
    'job-attributes-tag'?: IppGroup | IppGroup[];
    'printer-attributes-tag'?: IppGroup | IppGroup[];
  }

  export class Printer {
    constructor(url: string, options?: { version?: string; uri?: string });
    execute(
      operation: string,
      message: IppRequest | null,
      callback: (error: Error | null, response: IppResponse) => void
    ): void;
  }
}
