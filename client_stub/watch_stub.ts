import { WebSocketServer, WebSocket } from 'ws';

// Bench stand-in for one watch: serves /imu and streams accel/gyro pairs.
const port = Number(process.argv[2] ?? 8081);
const rateHz = Number(process.argv[3] ?? 50);
const watchId = process.argv[4] ?? 'bench-watch';

const wss = new WebSocketServer({ port, path: '/imu' });
let tick = 0;

const emit = (ws: WebSocket, type: 'accel' | 'gyro', x: number, y: number, z: number) => {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(
    JSON.stringify({
      watch_id: watchId,
      type,
      timestamp_ns: Date.now() * 1_000_000,
      x,
      y,
      z
    })
  );
};

const timer = setInterval(() => {
  const t = tick++ / rateHz;
  for (const client of wss.clients) {
    emit(client, 'accel', Math.sin(t * 2 * Math.PI), Math.cos(t * 2 * Math.PI), 9.81);
    emit(client, 'gyro', 0.1 * Math.sin(t), 0.1 * Math.cos(t), 0);
  }
}, 1000 / rateHz);

wss.on('connection', (_, request) => {
  console.log('client connected', request.socket.remoteAddress);
});

wss.on('listening', () => {
  console.log(`watch stub streaming on ws://localhost:${port}/imu at ${rateHz} Hz`);
});

process.on('SIGINT', () => {
  clearInterval(timer);
  wss.close(() => process.exit(0));
});
