export { guarded, type GuardDeps, type GuardPolicy } from "./guarded.js";
