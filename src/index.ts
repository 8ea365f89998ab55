/**
 * m365audit - Microsoft Entra ID directory audit and remediation toolkit
 */

export * from './types';
export * from './core';
export * from './utils/constants';
export * from './utils/errors';
export * from './utils/logger';
export * from './utils/retry';
