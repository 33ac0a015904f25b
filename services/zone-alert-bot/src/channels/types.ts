import type { Alert, ChannelResult } from '../types/alert.js';

/**
 * 알림 채널. send/testConnection은 실패를 ChannelResult로 돌려주고 throw하지 않는다.
 * signal이 abort되면 진행 중인 요청을 취소한다.
 */
export interface NotificationChannel {
  readonly name: string;
  send(alert: Alert, signal?: AbortSignal): Promise<ChannelResult>;
  testConnection(): Promise<ChannelResult>;
}

export function channelFailure(
  channelName: string,
  errorMessage: string,
  responseData?: Record<string, unknown>,
): ChannelResult {
  return responseData
    ? { success: false, channelName, errorMessage, responseData }
    : { success: false, channelName, errorMessage };
}

export function channelSuccess(
  channelName: string,
  responseData?: Record<string, unknown>,
): ChannelResult {
  return responseData ? { success: true, channelName, responseData } : { success: true, channelName };
}
