import { z } from 'zod';
import { KIS_API } from '@/constants/instruments';
import { AuthError } from '@/errors';
import { HttpResponse, IHttpClient } from '@/interfaces/IHttpClient';
import { IAuthTokenSource } from '@/interfaces/IQuoteProvider';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

/**
 * KIS OAuth token source
 *
 * One POST per call; tokens are not cached, so every quote costs two round trips.
 */
export class KisTokenSource implements IAuthTokenSource {
  constructor(private readonly http: IHttpClient) {}

  async obtain(appKey: string, appSecret: string): Promise<string> {
    let response: HttpResponse;
    try {
      response = await this.http.post(KIS_API.TOKEN_PATH, {
        grant_type: KIS_API.GRANT_TYPE,
        appkey: appKey,
        appsecret: appSecret,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Token endpoint unreachable: ${message}`);
    }

    if (response.status !== 200) {
      throw new AuthError(`Token request rejected with status ${response.status}`, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AuthError('Token response has no access_token', response.status);
    }

    return parsed.data.access_token;
  }
}
