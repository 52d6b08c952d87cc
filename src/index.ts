import 'reflect-metadata';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import type {AppEnv} from './config/env';
import type {LedgerStoreKind} from './config/types';
import {AppEnvToken} from './config/types';
import {pointsBankRouter} from './ledger/adapter/in/web/PointsBankController';

const app = new Hono();

// ルートエンドポイント
app.get('/', (c) => {
    return c.json({
        message: 'Points Bank API - Hexagonal Architecture with Hono + TypeScript',
        version: '1.0.0',
        endpoints: {
            summary: 'GET /api/summary',
            entries: 'GET /api/entries',
            quickEarn: 'POST /api/quick-earn',
            redeemReward: 'POST /api/rewards/redeem',
            adjustPoints: 'POST /api/adjustments (parent)',
            deleteEntry: 'DELETE /api/entries/:id (parent)',
        },
    });
});

// APIルーターをマウント
app.route('/api', pointsBankRouter);

// ヘルスチェックエンドポイント
app.get('/health', (c) => {
    const env = container.resolve<AppEnv>(AppEnvToken);
    const store: LedgerStoreKind = env.LEDGER_STORE;
    return c.json({
        status: 'healthy',
        store,
        parentPinRequired: env.PARENT_PIN !== undefined,
    });
});

export default app;
