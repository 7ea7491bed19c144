export {};

throw new Error("fixture failed to initialise");
