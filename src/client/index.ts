export { LfsClient, type FetchFn, type LfsClientOptions, type UploadResult } from './lfs-client'
