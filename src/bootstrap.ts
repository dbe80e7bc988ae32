import { HttpServerCatalog } from './catalog.js';
import type { AppConfig } from './config.js';
import { SystemResolver } from './dns-resolver.js';
import { HttpTransferProvider } from './http-transfer.js';
import { MeasurementOrchestrator } from './orchestrator.js';
import { TcpLatencyProbe } from './tcp-probe.js';

/** Wire the network-backed capabilities into an orchestrator. */
export function createOrchestrator(appConfig: AppConfig): MeasurementOrchestrator {
    const probe = new TcpLatencyProbe(appConfig.probe);
    const resolver = new SystemResolver(appConfig.dnsTimeoutMs);

    return new MeasurementOrchestrator({
        catalog: new HttpServerCatalog({
            ...appConfig.catalog,
            probe,
            resolver,
            probeTimeoutMs: appConfig.probe.timeoutMs
        }),
        provider: new HttpTransferProvider(appConfig.transfer),
        probe,
        resolver,
        fallbackHost: appConfig.fallbackHost
    });
}
