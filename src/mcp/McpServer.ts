import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { Config } from "../config";
import { CLUSTER_COMMAND_HELP } from "../monitor/SpotMonitor";
import type { SpotMonitor } from "../monitor/SpotMonitor";
import type { ClassifiedSpot } from "../spots/types";
import { describeError } from "../util/abort";

function text(value: string, isError: boolean = false) {
    return {
        content: [{ type: "text" as const, text: value }],
        ...(isError ? { isError: true } : {}),
    };
}

function json(value: unknown) {
    return text(JSON.stringify(value, null, 2));
}

function describeSpot({ spot, entityId, neededMultiBand, neededGrid }: ClassifiedSpot) {
    return {
        time: spot.time,
        band: spot.band,
        frequency: spot.frequency,
        callsign: spot.callsign,
        prefix: spot.prefix,
        grid: spot.grid,
        spotter: spot.spotter,
        comment: spot.comment,
        entityId,
        neededMultiBand,
        neededGrid,
    };
}

export class SpotMcpServer {
    private server: McpServer;
    private monitor: SpotMonitor;

    constructor(monitor: SpotMonitor, config: Config) {
        this.monitor = monitor;

        this.server = new McpServer({
            name: config.mcp.name,
            version: config.mcp.version,
        });

        this.setupTools();
        this.setupResources();
    }

    private setupTools() {
        // === Cluster ===

        this.server.tool(
            "cluster_send_command",
            "Send a command line to the DX cluster (e.g. 'sh/dx 20', 'set/filter dxbm/pass 20,15')",
            {
                command: z.string().describe("Cluster command to send"),
            },
            async ({ command }) => {
                try {
                    this.monitor.sendCommand(command);
                    return text(`Queued cluster command: ${command.trim()}`);
                } catch (error) {
                    return text(`Error: ${describeError(error)}`, true);
                }
            }
        );

        this.server.tool(
            "cluster_status",
            "Get the cluster connection state, latest solar report and spot rate",
            {},
            async () => json(this.monitor.getSnapshot())
        );

        this.server.tool(
            "cluster_connect",
            "Connect to the DX cluster (no-op when already connected)",
            {},
            async () => {
                if (!this.monitor.connect()) {
                    return text(`Error: ${this.monitor.getSnapshot().status}`, true);
                }
                return text(`Cluster link ${this.monitor.getSnapshot().state}`);
            }
        );

        this.server.tool(
            "cluster_disconnect",
            "Disconnect from the DX cluster; queued commands are discarded",
            {},
            async () => {
                await this.monitor.disconnect();
                return text(`Cluster link ${this.monitor.getSnapshot().state}`);
            }
        );

        this.server.tool(
            "cluster_command_help",
            "List common DX cluster commands",
            {},
            async () => text(CLUSTER_COMMAND_HELP)
        );

        // === Spots ===

        this.server.tool(
            "get_spots",
            "Get buffered DX spots, needed spots first",
            {
                view: z.enum(["needed", "all"]).optional().describe("'needed' for award-needed spots only (default 'all')"),
                bands: z.array(z.string()).optional().describe("Bands to include (e.g. ['20m', '6m'])"),
                grid: z.string().optional().describe("Grid square prefix (e.g. 'FN')"),
                prefix: z.string().optional().describe("Entity prefix substring (e.g. 'VP8')"),
                limit: z.number().int().min(1).max(500).optional().describe("Maximum number of spots (default 50)"),
            },
            async ({ view, bands, grid, prefix, limit }) => {
                const spots = this.monitor.getSpots(view ?? "all", {
                    ...this.monitor.getFilter(),
                    ...(bands ? { bands } : {}),
                    ...(grid ? { grid } : {}),
                    ...(prefix ? { entityPrefix: prefix } : {}),
                });
                const shown = spots.slice(0, limit ?? 50).map(describeSpot);
                return json({ total: spots.length, spots: shown });
            }
        );

        // === Awards ===

        this.server.tool(
            "lookup_entity",
            "Resolve a callsign or prefix to its DXCC entity and the Challenge bands still needed",
            {
                call: z.string().describe("Callsign or prefix (e.g. 'IT9ABC', 'VP8')"),
            },
            async ({ call }) => {
                const result = this.monitor.lookupEntity(call);
                if (result.country === null) {
                    return text(`No entity found for ${result.query}`, true);
                }
                return json(result);
            }
        );

        this.server.tool(
            "check_needed",
            "Check whether a station on a band would count toward the Challenge or the grid award",
            {
                call: z.string().describe("Callsign"),
                band: z.string().describe("Band (e.g. '20m')"),
                grid: z.string().optional().describe("Grid square, checked on the grid award band only"),
            },
            async ({ call, band, grid }) => json(this.monitor.checkNeeded(call, band, grid ?? ""))
        );

        this.server.tool(
            "reload_awards",
            "Reload the award progress files from disk",
            {},
            async () => {
                try {
                    const result = await this.monitor.reloadAwards();
                    return json(result);
                } catch (error) {
                    return text(`Error: ${describeError(error)}`, true);
                }
            }
        );

        this.server.tool(
            "award_stats",
            "Get Challenge and grid award progress",
            {},
            async () => {
                const snapshot = this.monitor.getSnapshot();
                return json({ challenge: snapshot.challenge, grids: snapshot.grids });
            }
        );
    }

    private setupResources() {
        this.server.resource(
            "needed-spots",
            "dx-spots://needed",
            async (uri) => ({
                contents: [{
                    uri: uri.href,
                    text: JSON.stringify(this.monitor.getSpots("needed").map(describeSpot), null, 2),
                    mimeType: "application/json",
                }],
            })
        );
    }

    public async start() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error("MCP server started on stdio");
    }

    public async stop() {
        await this.server.close();
    }
}
