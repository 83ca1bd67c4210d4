import { createSocket, type Socket } from "node:dgram";

export interface Transport {
  send(message: string): Promise<void>;
  close(): Promise<void>;
}

export interface SimulationTarget {
  host: string;
  port: number;
}

export class UdpTransport implements Transport {
  private readonly socket: Socket;

  constructor(private readonly target: SimulationTarget) {
    this.socket = createSocket("udp4");
  }

  send(message: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(message, this.target.port, this.target.host, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}
