/** Options registered on the root program and visible to every command */
export type GlobalOptions = {
  cwd?: string;
};
