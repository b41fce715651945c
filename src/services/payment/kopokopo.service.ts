import axios, { AxiosInstance } from 'axios';
import logger from '../../config/logger';
import { toProviderPhone } from '../../utils/phoneNormalizer';
import {
  KopoKopoStkRequest,
  KopoKopoStkResponse,
  KopoKopoTokenResponse,
  PaymentError,
  StkPushSender,
} from '../../types/payment';

export interface KopoKopoOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  /** Static bearer token; when set, OAuth is never used */
  accessToken: string;
  tillNumber: string;
  callbackUrl: string;
  timeoutMs?: number;
}

const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;
const DEFAULT_TOKEN_TTL_SECONDS = 3600;

/**
 * KopoKopoService sends M-Pesa STK push requests through Kopo Kopo
 * Implements token caching with proactive refresh and one retry on 401
 */
export class KopoKopoService implements StkPushSender {
  private readonly axiosInstance: AxiosInstance;
  private token: string | null = null;
  private tokenExpiry: number | null = null;

  constructor(private readonly options: KopoKopoOptions, axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 30000,
        headers: {
          Accept: 'application/json',
        },
      });
  }

  /**
   * @throws PaymentError if configuration is missing
   */
  private validateConfig(): void {
    const hasCredentials = Boolean(this.options.clientId && this.options.clientSecret);

    if (!this.options.accessToken && !hasCredentials) {
      throw new PaymentError(
        'Kopo Kopo credentials not configured. Set KOPOKOPO_ACCESS_TOKEN or KOPOKOPO_CLIENT_ID and KOPOKOPO_CLIENT_SECRET',
        'CONFIG_ERROR',
        'KOPOKOPO'
      );
    }

    if (!this.options.tillNumber || !this.options.callbackUrl) {
      throw new PaymentError(
        'Kopo Kopo till number or callback URL not configured. Set KOPOKOPO_TILL_NUMBER and KOPOKOPO_CALLBACK_URL',
        'CONFIG_ERROR',
        'KOPOKOPO'
      );
    }
  }

  private usesStaticToken(): boolean {
    return Boolean(this.options.accessToken);
  }

  /**
   * Gets the configured token or a cached OAuth token
   * Refreshes five minutes before expiry
   */
  private async getAccessToken(): Promise<string> {
    if (this.options.accessToken) {
      return this.options.accessToken;
    }

    const now = Date.now();
    if (this.token && this.tokenExpiry && now < this.tokenExpiry - TOKEN_REFRESH_BUFFER_MS) {
      logger.debug('Using cached Kopo Kopo token');
      return this.token;
    }

    try {
      logger.info('Refreshing Kopo Kopo access token');

      const form = new URLSearchParams({
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        grant_type: 'client_credentials',
      });

      const response = await this.axiosInstance.post<KopoKopoTokenResponse>(
        '/oauth/token',
        form.toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
      );

      if (!response.data.access_token) {
        throw new PaymentError(
          'Kopo Kopo authentication failed: No token in response',
          'AUTH_FAILED',
          'KOPOKOPO',
          response.data
        );
      }

      const expiresIn = response.data.expires_in || DEFAULT_TOKEN_TTL_SECONDS;
      this.token = response.data.access_token;
      this.tokenExpiry = now + expiresIn * 1000;

      logger.info(`Kopo Kopo token refreshed. Expires in ${expiresIn} seconds`);

      return this.token;
    } catch (error) {
      logger.error('Kopo Kopo token refresh failed:', error);

      if (error instanceof PaymentError) {
        throw error;
      }
      throw new PaymentError(
        `Kopo Kopo authentication failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'AUTH_FAILED',
        'KOPOKOPO',
        error
      );
    }
  }

  private invalidateToken(): void {
    this.token = null;
    this.tokenExpiry = null;
  }

  private async postIncomingPayment(payload: KopoKopoStkRequest): Promise<KopoKopoStkResponse> {
    const token = await this.getAccessToken();

    const response = await this.axiosInstance.post('/api/v1/incoming_payments', payload, {
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      validateStatus: (status) => status === 200 || status === 201,
    });

    const location = response.headers['location'];
    return { location: typeof location === 'string' ? location : '' };
  }

  /**
   * Requests an M-Pesa PIN prompt on the customer's phone
   * @param phone - Any accepted format; sent as 254xxxxxxxxx
   */
  async sendStkPush(orderId: string, phone: string, amount: number): Promise<KopoKopoStkResponse> {
    try {
      this.validateConfig();

      const payload: KopoKopoStkRequest = {
        payment_channel: 'M-PESA STK Push',
        till_number: this.options.tillNumber,
        subscriber: {
          phone_number: toProviderPhone(phone),
        },
        amount: {
          currency: 'KES',
          value: amount.toFixed(0),
        },
        metadata: {
          order_id: orderId,
        },
        _links: {
          callback_url: this.options.callbackUrl,
        },
      };

      logger.info(`Initiating STK push: order=${orderId}, phone=${payload.subscriber.phone_number}, amount=${payload.amount.value}`);

      let result: KopoKopoStkResponse;
      try {
        result = await this.postIncomingPayment(payload);
      } catch (error) {
        if (!this.usesStaticToken() && axios.isAxiosError(error) && error.response?.status === 401) {
          logger.warn('Kopo Kopo rejected the token, refreshing and retrying once');
          this.invalidateToken();
          result = await this.postIncomingPayment(payload);
        } else {
          throw error;
        }
      }

      logger.info(`STK push accepted: order=${orderId}, location=${result.location || 'n/a'}`);
      return result;
    } catch (error) {
      logger.error(`STK push failed for order ${orderId}:`, error);

      if (error instanceof PaymentError) {
        throw error;
      }

      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new PaymentError(
        `STK push failed${status ? ` (HTTP ${status})` : ''}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'STK_PUSH_FAILED',
        'KOPOKOPO',
        error
      );
    }
  }
}
