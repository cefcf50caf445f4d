// @EventPattern needs a static value, so the topic is not configurable.
export const STUDY_MATERIAL_TOPIC = 'study-material-events';
