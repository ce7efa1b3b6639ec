/**
 * Web層専用のレスポンスモデル
 */
export interface AccountWebResponse {
    success: boolean;
    message: string;
    data?: {
        accountId: string;
        balance: number;
    };
    error?: {
        code: string;
        details?: Record<string, unknown>;
    };
}
