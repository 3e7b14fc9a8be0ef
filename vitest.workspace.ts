export default ['packages/shared', 'apps/orchestrator'];
