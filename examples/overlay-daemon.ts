import {LoadAverageSource, OverlayRuntime, RecordingRenderer, type RenderCall} from '../src';

type CliOptions = {
    port?: number;
    config: string;
    loadavg: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {config: 'config.json', loadavg: false};

    for (const arg of argv) {
        if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) {
                options.port = port;
            }
        } else if (arg.startsWith('--config=')) {
            options.config = arg.substring('--config='.length);
        } else if (arg === '--loadavg') {
            options.loadavg = true;
        }
    }
    return options;
}

function describeCall(call: RenderCall): string {
    switch (call.method) {
        case 'create':
            return `#${call.handle} create ${call.kind} (asset ${call.id})`;
        case 'destroy':
            return `#${call.handle} destroy`;
        case 'setPercent':
            return `#${call.handle} ${call.percent}%`;
        case 'setText':
            return `#${call.handle} "${call.text}"`;
        case 'relayout':
            return `#${call.handle} at ${call.geometry.x},${call.geometry.y} ${call.geometry.width}x${call.geometry.height}`;
        case 'restyle':
            return `#${call.handle} restyle`;
    }
}

const options = parseArgs(process.argv.slice(2));

// Prints renderer calls instead of drawing them.
const renderer: RecordingRenderer = new RecordingRenderer({
    onCall: (call) => {
        console.log(describeCall(call));
        renderer.reset();
    },
});

const runtime = new OverlayRuntime({
    renderer,
    port: options.port,
    configPath: options.config,
    telemetry: options.loadavg ? [new LoadAverageSource()] : [],
});

console.log(`Listening on UDP ${options.port ?? 7777}, SIGHUP reloads ${options.config}, Ctrl+C stops`);
await runtime.run();
