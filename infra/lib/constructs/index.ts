export { ApiConstruct } from './api-construct';
export type { ApiProps } from './api-construct';
export { HostingConstruct } from './hosting-construct';
export type { HostingConstructProps } from './hosting-construct';
