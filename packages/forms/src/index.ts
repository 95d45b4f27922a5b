// Registration
export {
  registerSchema,
  RegisteredUserSchema,
  createRegisterPipeline,
  toRegisterRequest,
} from './register/RegisterForm.js';
export type { RegisterRequest, RegisteredUser, RegisterPipelineConfig } from './register/RegisterForm.js';

// Employees
export {
  employeeSchema,
  EmployeeSchema,
  DEPARTMENTS,
  createEmployeePipeline,
  toEmployeeRequest,
} from './employee/EmployeeForm.js';
export type { Employee, EmployeeRequest, Department, EmployeePipelineConfig } from './employee/EmployeeForm.js';
