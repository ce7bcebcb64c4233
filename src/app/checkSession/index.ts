export * from './interfaces/ICheckSession';
export * from './services/checkSessionService';
export * from './adapters/outcomeReportAdapter';
