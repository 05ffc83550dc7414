import { z } from "zod";

/**
 * Exact input header, order-sensitive.
 */
export const OBSERVATION_HEADER_V1 = Object.freeze(["t_s", "E_proxy", "discharge"] as const);

const RealZ = z.number({ invalid_type_error: "must be a finite real" }).finite({ message: "must be a finite real" });

/**
 * One observation after parsing. `m` is the raw magnitude (E_proxy).
 */
export const ObservationV1Z = z
  .object({
    t: RealZ,
    m: RealZ.nonnegative({ message: "must be >= 0" }),
    discharge: z.union([z.literal(0), z.literal(1)], { errorMap: () => ({ message: "must be 0 or 1" }) })
  })
  .strict();

export type ObservationV1 = z.infer<typeof ObservationV1Z>;
