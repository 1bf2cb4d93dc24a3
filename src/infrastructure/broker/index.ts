export { Channel } from './channel.js';
export { ActionMonitorClient, topicName } from './action-monitor-client.js';
export type { ActionMonitorClientOptions } from './action-monitor-client.js';
