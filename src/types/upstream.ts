/**
 * Upstream payload shapes, limited to the fields the adapters read.
 * Everything else in the responses is ignored.
 */

import { Type, type Static } from "@sinclair/typebox";

const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

const Scalar = Type.Union([Type.String(), Type.Number(), Type.Null()]);

// ============================================================================
// NEIS open API
// ============================================================================

/**
 * Every NEIS service answers `{ <service>: [ { head }, { row: [...] } ] }`.
 * A request with no matches answers `{ RESULT: { CODE: "INFO-200" } }`
 * instead, without the service key.
 */
export const NeisServiceSchema = Type.Array(
  Type.Object({
    head: Type.Optional(Type.Array(Type.Unknown())),
    row: Type.Optional(Type.Array(Type.Unknown())),
  })
);

export const NeisResultSchema = Type.Object({
  RESULT: Type.Object({
    CODE: Type.String(),
    MESSAGE: Type.Optional(Type.String()),
  }),
});

export const NeisMealRowSchema = Type.Object({
  MLSV_YMD: Type.String(),
  DDISH_NM: OptionalText,
  CAL_INFO: OptionalText,
});

export type NeisMealRow = Static<typeof NeisMealRowSchema>;

export const NeisScheduleRowSchema = Type.Object({
  AA_YMD: Type.String(),
  EVENT_NM: Type.String(),
  ONE_GRADE_EVENT_YN: OptionalText,
  TW_GRADE_EVENT_YN: OptionalText,
  THREE_GRADE_EVENT_YN: OptionalText,
  FR_GRADE_EVENT_YN: OptionalText,
  FIV_GRADE_EVENT_YN: OptionalText,
  SIX_GRADE_EVENT_YN: OptionalText,
});

export type NeisScheduleRow = Static<typeof NeisScheduleRowSchema>;

export const NeisTimetableRowSchema = Type.Object({
  ALL_TI_YMD: Type.String(),
  GRADE: Type.Optional(Scalar),
  CLASS_NM: Type.Optional(Scalar),
  ITRT_CNTNT: OptionalText,
});

export type NeisTimetableRow = Static<typeof NeisTimetableRowSchema>;

// ============================================================================
// KMA short-term forecast
// ============================================================================

export const KmaItemSchema = Type.Object({
  category: Type.String(),
  fcstDate: Type.String(),
  fcstTime: Type.String(),
  fcstValue: Type.Union([Type.String(), Type.Number()]),
});

export type KmaItem = Static<typeof KmaItemSchema>;

export const KmaHeaderSchema = Type.Object({
  response: Type.Object({
    header: Type.Optional(
      Type.Object({
        resultCode: Type.Optional(Type.String()),
        resultMsg: Type.Optional(Type.String()),
      })
    ),
  }),
});

export const KmaItemsSchema = Type.Object({
  response: Type.Object({
    body: Type.Object({
      items: Type.Object({
        item: Type.Array(Type.Unknown()),
      }),
    }),
  }),
});

// ============================================================================
// Seoul open data: river water temperature
// ============================================================================

export const WaterRowSchema = Type.Object({
  YMD: Type.Optional(Type.String()),
  HR: Type.Optional(Type.String()),
  WATT: Type.Optional(Scalar),
});

export type WaterRow = Static<typeof WaterRowSchema>;

export const WaterResponseSchema = Type.Object({
  WPOSInformationTime: Type.Object({
    row: Type.Array(Type.Unknown()),
  }),
});

// ============================================================================
// Generic
// ============================================================================

export const JsonObjectSchema = Type.Record(Type.String(), Type.Unknown());

export type JsonObject = Static<typeof JsonObjectSchema>;
