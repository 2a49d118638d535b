import type { PayloadOf } from "./message.js";

export const echo = (req: PayloadOf<"echo">): PayloadOf<"echo_ok"> => ({
  type: "echo_ok",
  echo: req.echo,
});
