export * from "./inklayer";
