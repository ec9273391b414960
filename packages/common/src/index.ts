// @haiku-finder/common - Shared utilities for haiku-finder packages

export * from './logging.js';
