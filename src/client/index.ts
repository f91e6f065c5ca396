export { Requester } from './rpc/Requester';
export type { RequesterConfig, RequestOptions } from './rpc/Requester';
