export {
  JobSupervisor,
  isValidCron,
  type JobDefinition,
  type JobSchedule,
  type JobStatus,
} from './job-supervisor.js';
