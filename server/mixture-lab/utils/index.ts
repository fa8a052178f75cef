export * from "./LabErrors";
export * from "./LabLogger";
export * from "./MathUtils";
export * from "./SeededRNG";
