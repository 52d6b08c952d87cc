import { container } from 'tsyringe'
import type { InitializeLedgerStorePort } from '../ledger/application/port/out/InitializeLedgerStorePort'
import { InitializeLedgerStorePortToken } from '../ledger/application/port/out/InitializeLedgerStorePort'
import { disposeContainer, resetContainer, setupContainer } from './container'
import type { AppEnv } from './env'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 台帳ストアのスキーマ確認・作成（ensureSchema）
 *
 * ensureSchema が失敗した場合は StoreUnavailableException がそのまま伝わる。
 * 次回の呼び出しで再度初期化を試みる。
 */

let isInitialized = false

export async function initializeApplication(env: AppEnv): Promise<void> {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    // ① DIコンテナの設定
    setupContainer(env)

    // ② 台帳ストアの準備（冪等）
    const store = container.resolve<InitializeLedgerStorePort>(InitializeLedgerStorePortToken)
    await store.ensureSchema()

    isInitialized = true
    console.log('✅ Application initialized')
}

/**
 * 所有している接続を閉じる（プロセス終了時）
 */
export async function shutdownApplication(): Promise<void> {
    await disposeContainer()
    isInitialized = false
    console.log('👋 Application stopped')
}

export function resetApplication(): void {
    resetContainer()
    isInitialized = false
    console.log('🔄 Application reset')
}
