/**
 * Type declarations for s3db.js
 */

declare module 's3db.js' {
  export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

  export interface S3dbOptions {
    connectionString: string
    passphrase?: string
    logLevel?: LogLevel
  }

  export interface ResourceSchema {
    name: string
    attributes: Record<string, string>
    behavior?: string
    timestamps?: boolean
  }

  export interface ListOptions {
    limit?: number
    offset?: number
  }

  export interface Resource {
    insert(data: Record<string, unknown>): Promise<unknown>
    getOrNull(id: string): Promise<unknown>
    update(id: string, data: Record<string, unknown>): Promise<unknown>
    delete(id: string): Promise<void>
    list(options?: ListOptions): Promise<unknown[]>
  }

  export class S3db {
    constructor(options: S3dbOptions)
    connect(): Promise<void>
    disconnect(): Promise<void>
    createResource(schema: ResourceSchema): Promise<Resource>
  }
}
