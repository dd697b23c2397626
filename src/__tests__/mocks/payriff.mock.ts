/**
 * Payriff API mocks for testing
 *
 * 以 axios adapter 取代網路層，記錄送出的請求並回傳指定內容。
 */
import axios from 'axios'
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import { vi } from 'vitest'
import winston from 'winston'

export const silentLogger = winston.createLogger({ silent: true })

export interface MockReply {
  status?: number
  /** 字串原樣回傳，其他值先 JSON 編碼 */
  body: unknown
}

export function createMockHttp(reply: MockReply | ((config: InternalAxiosRequestConfig) => MockReply)) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const { status = 200, body } = typeof reply === 'function' ? reply(config) : reply
    return {
      data: typeof body === 'string' ? body : JSON.stringify(body),
      status,
      statusText: String(status),
      headers: {},
      config,
    }
  })
  const http: AxiosInstance = axios.create({ adapter })
  return { http, adapter }
}

export function createFailingHttp(error: Error) {
  const adapter = vi.fn(async (_config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    throw error
  })
  const http: AxiosInstance = axios.create({ adapter })
  return { http, adapter }
}

export const mockOrderPayload = {
  orderId: 'O1',
  paymentUrl: 'https://pay/O1',
  transactionId: 7,
}

export const mockTransaction = {
  uuid: 'T1',
  createdDate: '2024-05-01T10:00:05',
  status: 'APPROVED',
  channel: 'WEB',
  channelType: 'ECOM',
  requestRrn: '111111',
  responseRrn: null,
  pan: '400000******0002',
  paymentWay: 'CARD',
  cardDetails: {
    maskedPan: '400000******0002',
    brand: 'VISA',
    cardHolderName: 'TEST HOLDER',
  },
  merchantCategory: '5411',
  installment: { type: null, period: null },
  deliveryAddress: null,
}

export const mockOrderInfo = {
  orderId: 'O1',
  invoiceUuid: null,
  amount: 25.5,
  currencyType: 'AZN',
  merchantName: 'Test Merchant',
  operationType: 'PURCHASE',
  paymentStatus: 'APPROVED',
  auto: false,
  createdDate: '2024-05-01T10:00:00',
  description: 'Order',
  transactions: [mockTransaction],
}
