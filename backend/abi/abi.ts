import StateViewAbi from "./StateViewAbi";

export { StateViewAbi };
