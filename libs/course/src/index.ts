export * from './course';
export * from './course-element';
export * from './course-geometry';
export * from './course.errors';
export * from './elevation-profile';
export * from './mile-mark-estimator';
export * from './route';
export * from './route-path';
export * from './spatial-index';
