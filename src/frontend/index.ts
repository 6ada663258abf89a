/**
 * @module frontend
 *
 * 引擎前端：指令规范化。
 */

export { normalize } from './normalizer.js';
