export * from './types';
export * from './errors';
export { createModuleLogger, createNullLogger, formatLogMetadata } from './logger';
export type { ModuleLogger } from './logger';
export { delay, retry, toArray, booleanFromString } from './utils';
export type { RetryOptions } from './utils';
export { loadConfig, initializeConfig, defaultConfig, camelToSnakeCase } from './config';
export type { Tr064Config } from './config';
export { loadEnv, getProcessedEnv, isStringLosslesslyNumeric } from './envLoader';
export { Action, ServiceSchema, Service, Device, Description } from './descriptionModel';
export { parseDeviceDescription, parseServiceSchema, loadSource } from './descriptionProcessor';
export { DeviceManager } from './deviceManager';
export type { DiscoverOptions, DeviceManagerOptions } from './deviceManager';
export { HttpClient } from './httpClient';
export type { HttpClientOptions, HttpResponse, HttpTransport } from './httpClient';
export { parseDigestChallenge, buildDigestAuthorization } from './digestAuth';
export type { DigestChallenge, DigestCredentials } from './digestAuth';
export { SoapClient, buildSoapEnvelope } from './soapClient';
export type { SoapClientOptions } from './soapClient';
export { getConvertedValue, encodeArgumentValue } from './valueConverters';
export { ApiCache } from './apiCache';
export { Tr064Connection } from './connection';
export type { Tr064ConnectionOptions } from './connection';
