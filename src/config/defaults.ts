/**
 * Задачи, которые `flexrun init` записывает в новый конфиг.
 * Приложение запускается через streamlit из poetry-окружения.
 */
export const DEFAULT_TASKS = {
  setup: {
    description: 'Install dependencies and the pre-commit hook',
    commands: ['poetry install', 'poetry run pre-commit install'],
  },
  'dfs-app': {
    description: 'Launch the Demand Flexibility Service dashboard',
    commands: ['poetry run streamlit run consumer_flex_app/demand_flexibility_service/app.py'],
    inputs: ['consumer_flex_app/demand_flexibility_service/app.py'],
  },
  requirements: {
    description: 'Export the locked dependency set to requirements.txt',
    commands: ['poetry export -f requirements.txt --output requirements.txt --without-hashes'],
    outputs: ['requirements.txt'],
  },
};
