export { createGitRepository, parseLines } from "./git";
