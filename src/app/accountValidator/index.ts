/**
 * Модуль проверки аккаунтов через VPN клиент
 */

export * from './interfaces/IAccountValidator';
export * from './services/accountValidatorService';
export * from './parts/loginRules';
export * from './parts/expiryParser';
export * from './parts/clientCommands';
