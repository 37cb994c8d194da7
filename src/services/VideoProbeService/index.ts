export * from "./VideoProbeService";
export * from "./VideoProbeServiceFFprobe";
