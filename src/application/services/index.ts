export {
  type AuthService,
  type AuthResult,
  AuthOutcome,
  createAuthService,
} from "./auth.service.js";
export {
  type Enrollment,
  type EnrollmentService,
  createEnrollmentService,
  groupSecret,
} from "./enrollment.service.js";
