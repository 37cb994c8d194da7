export * from "./FileTimeTimestampSource";
export * from "./FilenameTimestampSource";
export * from "./MetadataTimestampSource";
export * from "./TimestampSource";
