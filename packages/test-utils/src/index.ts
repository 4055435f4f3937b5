export { garbageCollect } from './garbage-collect.js';
