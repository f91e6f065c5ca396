export { Responder } from './rpc/Responder';
export type { ResponderConfig, ResponderHandler, RequestContext } from './rpc/Responder';
