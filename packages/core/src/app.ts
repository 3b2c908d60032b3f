/**
 * @perch/core: Application bootstrap
 *
 * Builds the bus, the services, the bridge and the eight presenters,
 * and starts them. The returned AppContext is the one object the UI
 * holds; there is no module-level state.
 */

import { AppEvents, Settings, createLogger, setLogLevel } from '@perch/shared';
import type { AppEvent, PerchConfig } from '@perch/shared';
import { EventBus } from './events/event-bus.js';
import { createBridge } from './bridge/ui-bridge.js';
import type { Bridge } from './bridge/ui-bridge.js';
import type { Notifier } from './bridge/view-command-sink.js';
import {
    ChatPresenter,
    ErrorPresenter,
    HistoryPresenter,
    McpAddPresenter,
    McpConfigurePresenter,
    ModelSelectorPresenter,
    ProfileEditorPresenter,
    SettingsPresenter,
} from './presenters/index.js';
import type { Presenter, PresenterContext } from './presenters/index.js';
import type { Services } from './services/index.js';
import {
    CatalogMcpRegistryService,
    CatalogModelsRegistryService,
    ConfigAppSettingsService,
    EchoChatService,
    MemoryConversationService,
    MemoryProfileService,
    MemorySecretsService,
    SimulatedMcpService,
} from './services/memory/index.js';
import type { SettingsStore } from './services/memory/index.js';

const log = createLogger('App');

// ─── Types ────────────────────────────────────────────────────────

export interface AppOptions {
    /** Defaults to Settings.resolve() */
    readonly config?: PerchConfig;
    /** Build services on the app's bus; defaults to the in-memory set */
    readonly services?: (bus: EventBus<AppEvent>, config: PerchConfig) => Services;
    readonly notifier?: Notifier;
}

export interface AppContext {
    readonly config: PerchConfig;
    readonly bus: EventBus<AppEvent>;
    readonly services: Services;
    readonly bridge: Bridge;
    readonly presenters: readonly Presenter[];
    shutdown(): Promise<void>;
}

// ─── Default services ─────────────────────────────────────────────

export function createDefaultServices(bus: EventBus<AppEvent>, config: PerchConfig, store: SettingsStore = Settings): Services {
    const conversations = new MemoryConversationService(bus);
    const mcpRegistry = new CatalogMcpRegistryService();
    return {
        conversations,
        chat: new EchoChatService(bus, conversations, { chunkDelayMs: config.streamChunkDelayMs }),
        profiles: new MemoryProfileService(bus, { defaultId: config.defaultProfileId }),
        mcp: new SimulatedMcpService(bus, { tools: (server) => mcpRegistry.toolsFor(server.registryName) }),
        mcpRegistry,
        modelsRegistry: new CatalogModelsRegistryService(bus),
        appSettings: new ConfigAppSettingsService(bus, store),
        secrets: new MemorySecretsService(),
    };
}

export function createPresenters(context: PresenterContext, services: Services): Presenter[] {
    return [
        new ChatPresenter(context, services),
        new HistoryPresenter(context, services.conversations),
        new SettingsPresenter(context, services),
        new ProfileEditorPresenter(context, services),
        new McpAddPresenter(context, { registry: services.mcpRegistry, mcp: services.mcp }),
        new McpConfigurePresenter(context, services.mcp),
        new ModelSelectorPresenter(context, services.modelsRegistry),
        new ErrorPresenter(context),
    ];
}

// ─── Bootstrap ────────────────────────────────────────────────────

export async function createApp(options: AppOptions = {}): Promise<AppContext> {
    const config = options.config ?? Settings.resolve();
    setLogLevel(config.logLevel);

    const bus = new EventBus<AppEvent>(config.busCapacity);
    const services = (options.services ?? createDefaultServices)(bus, config);
    const bridge = createBridge({
        bus,
        userEventCapacity: config.userEventCapacity,
        viewCommandCapacity: config.viewCommandCapacity,
        notifier: options.notifier,
    });

    const presenters = createPresenters({ bus, sink: bridge.sink }, services);
    for (const presenter of presenters) presenter.start();
    log.info(`Started ${presenters.length} presenters (bus capacity ${config.busCapacity})`);

    bus.publish(AppEvents.system({ type: 'app_launched' }));
    bus.publish(AppEvents.system({ type: 'config_loaded' }));

    try {
        await services.modelsRegistry.refresh();
    } catch (err) {
        // Reported on the bus as models_registry_refresh_failed
        log.warn('Model registry unavailable at launch', err);
    }

    let stopped = false;
    return {
        config,
        bus,
        services,
        bridge,
        presenters,
        async shutdown() {
            if (stopped) return;
            stopped = true;

            bus.publish(AppEvents.system({ type: 'app_will_terminate' }));
            await Promise.all(presenters.map((p) => p.join()));
            await services.chat.cancel();
            await bridge.close();
            bus.close();
            log.info('Shut down');
        },
    };
}
