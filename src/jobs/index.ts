export * from "./loadJobs";
