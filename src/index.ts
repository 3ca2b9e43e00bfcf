import { getConfigFilePath, hasConfigFile, loadConfig } from './config';
import { SpotMonitor } from './monitor/SpotMonitor';
import { SpotMcpServer } from './mcp/McpServer';
import { WebServer } from './web/server';
import { describeError } from './util/abort';

async function main() {
    // stdout carries the MCP protocol when it is enabled; keep diagnostics on stderr
    const config = loadConfig();
    if (config.mcp.enabled) {
        console.log = (...args: unknown[]) => console.error(...args);
        console.info = console.log;
    }

    console.log('Starting DX Spot Monitor...');
    if (hasConfigFile()) {
        console.log(`Loaded config from ${getConfigFilePath()}`);
    }

    try {
        console.log(`Cluster: ${config.cluster.host}:${config.cluster.port} as ${config.station.callsign || '(no callsign)'}`);

        const monitor = new SpotMonitor(config);
        await monitor.initialize();

        const webServer = new WebServer(config, monitor);
        const mcpServer = config.mcp.enabled ? new SpotMcpServer(monitor, config) : null;

        monitor.start();

        if (mcpServer) {
            await mcpServer.start();
        }

        webServer.start();

        let shuttingDown = false;
        const shutdown = async () => {
            if (shuttingDown) return;
            shuttingDown = true;
            console.log('\nShutting down...');
            await monitor.stop();
            await webServer.stop();
            if (mcpServer) {
                await mcpServer.stop();
            }
            process.exit(0);
        };

        process.on('SIGINT', () => {
            shutdown().catch(error => {
                console.error('Error during shutdown:', describeError(error));
                process.exit(1);
            });
        });

    } catch (error) {
        console.error('Failed to start server:', describeError(error));
        if (error instanceof Error && error.stack) {
            console.error(error.stack);
        }
        process.exit(1);
    }
}

main().catch(error => {
    console.error('Fatal error:', describeError(error));
    process.exit(1);
});
