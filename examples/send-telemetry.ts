import {OverlaySender} from '../src';

const host = process.argv[2] ?? '127.0.0.1';
const sender = new OverlaySender({host});

await sender.send({
    assetUpdates: [
        {id: 0, enabled: true, kind: 'bar', label: 'cpu', textIndex: 0, segments: 10},
        {id: 1, enabled: true, kind: 'text', textIndices: [1, 2], textInline: true, y: 120},
    ],
});

let tick = 0;
const timer = setInterval(() => {
    const cpu = (Math.sin(tick / 10) + 1) / 2;
    const clock = new Date().toLocaleTimeString();
    tick++;
    sender
        .send({values: [cpu], texts: [`cpu ${Math.round(cpu * 100)}%`, 'time', clock]})
        .catch((err: unknown) => console.error(err));
}, 100);

process.once('SIGINT', () => {
    clearInterval(timer);
    sender.close();
});
