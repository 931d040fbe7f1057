export * from './api';
export * from './config';
export * from './poller';
export * from './report';
