export * from "@/models/base";
export * from "@/models/events";
export * from "@/models/player";
export * from "@/models/round";
export * from "@/models/standings";
export * from "@/models/tournament";
