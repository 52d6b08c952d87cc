import 'reflect-metadata';
import {serve} from '@hono/node-server';
import {config} from 'dotenv';
import {initializeApplication, shutdownApplication} from './config/app-initializer';
import {loadEnv} from './config/env';
import app from './index';

// .env ファイルを読み込む（既に設定済みの環境変数は上書きしない）
config();

async function main(): Promise<void> {
    const env = loadEnv();

    // 初期化処理（DIコンテナ + スキーマ確認）
    await initializeApplication(env);

    const server = serve({fetch: app.fetch, port: env.PORT}, (info) => {
        console.log(`🚀 Points Bank listening on http://localhost:${String(info.port)}`);
    });

    const stop = (signal: string): void => {
        console.log(`🔌 ${signal} received, shutting down...`);
        server.close();
        shutdownApplication()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error('❌ Failed to close ledger store:', error);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => stop('SIGINT'));
    process.on('SIGTERM', () => stop('SIGTERM'));
}

main().catch((error: unknown) => {
    console.error('❌ Failed to start application:', error);
    process.exit(1);
});
