/**
 * Destination Registry
 *
 * The airports every search is planned against, in display order.
 * Tokens are whatever the journey planner accepts as an arrival point:
 * a "lat,lon" pair or a NaPTAN stop id.
 */

import type { Destination } from "@shared/schema";

export const AIRPORTS: readonly Destination[] = Object.freeze([
  Object.freeze({ name: "Heathrow", locationToken: "51.471618,-0.454037" }),
  Object.freeze({ name: "Gatwick", locationToken: "920GLGW0" }),
  Object.freeze({ name: "Stansted", locationToken: "920GSTN1" }),
  Object.freeze({ name: "Luton", locationToken: "910GLUTOAPY" }),
  Object.freeze({ name: "London City", locationToken: "51.503419,0.048749" }),
  Object.freeze({ name: "Southend", locationToken: "51.56867,0.70505" }),
]);
