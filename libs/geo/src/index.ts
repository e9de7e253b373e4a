export * from './geo-utils';
