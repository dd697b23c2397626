/**
 * 型別統一匯出入口
 *
 * 所有型別定義都透過此檔案匯出
 *
 * @example
 * import type { OrderInfo, ApiResponse } from '@/types';
 */

// 通用型別
export * from './common';
export * from './api';
export * from './config';
export * from './errors';

// 模型型別
export * from './models/order';
