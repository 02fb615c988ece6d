/**
 * kenvoy: Envoy configuration and stable cluster naming for Kubernetes backends.
 */

export * from './core';
export * from './envoy';
export * from './config';
