import dgram from "dgram";
import { CollectorEndpoint } from "../types/inputTrace";

/** Resolves true when something already holds the UDP endpoint. */
export type EndpointProbe = (endpoint: CollectorEndpoint) => Promise<boolean>;

export const udpEndpointInUse: EndpointProbe = (endpoint) =>
  new Promise((resolve, reject) => {
    const socket = dgram.createSocket(endpoint.host.includes(":") ? "udp6" : "udp4");
    socket.once("error", (error) => {
      socket.close();
      if ("code" in error && error.code === "EADDRINUSE") {
        resolve(true);
      } else {
        reject(error);
      }
    });
    socket.once("listening", () => {
      socket.close(() => resolve(false));
    });
    socket.bind(endpoint.port, endpoint.host);
  });
