import 'reflect-metadata';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import {accountRouter} from './account/adapter/in/web/AccountController';
import {toErrorResponse} from './account/adapter/in/web/mappers/AccountWebMapper';
import type {AppConfig} from './config/env';
import {AppConfigToken} from './config/types';

const app = new Hono();

// ルートエンドポイント
app.get('/', (c) => {
    return c.json({
        message: 'Balance Keeper API - Hexagonal Architecture with Hono + TypeScript',
        version: '1.0.0',
        endpoints: {
            openAccount: 'POST /api/accounts',
            getBalance: 'GET /api/accounts/:accountId/balance',
            deposit: 'POST /api/accounts/:accountId/deposit',
            withdraw: 'POST /api/accounts/:accountId/withdraw',
        },
    });
});

// APIルーターをマウント
app.route('/api', accountRouter);

// ヘルスチェックエンドポイント
app.get('/health', (c) => {
    const config = container.resolve<AppConfig>(AppConfigToken);
    return c.json({
        status: 'healthy',
        database: {
            driver: config.USE_SUPABASE ? 'supabase' : 'in-memory',
        },
    });
});

// 予期しないエラー（インフラエラー、バグ等）。詳細はログにだけ残す
app.onError((error, c) => {
    console.error('Unexpected error:', error);
    return c.json(toErrorResponse('Internal server error', 'INTERNAL_ERROR'), 500);
});

export default app;
