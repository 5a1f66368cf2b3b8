export * from "./schema/predict_request_v1";
export * from "./schema/prediction_response_v1";
export * from "./schema/prediction_record_v1";
export * from "./schema/health_v1";
export * from "./schema/stats_v1";
export * from "./schema/model_reload_v1";
export * from "./schema/error_v1";
