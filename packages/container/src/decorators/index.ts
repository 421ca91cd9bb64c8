export { Inject, type InjectOptions } from './inject.js';
export { Injectable, type InjectableOptions } from './injectable.js';
