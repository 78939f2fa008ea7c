export const en = {
  // shell.ts — printWelcome
  welcome_subtitle: " — AI-powered shell",
  welcome_hint:     "Type 'help' for available commands or 'exit' to quit.",
  // shell.ts — initialize
  ai_initializing:   "Initializing AI engine...",
  ai_loading_model:  "Loading AI model from:",
  ai_ready:          "AI engine ready!",
  history_load_failed: "Could not load history:",
  // shell.ts — processCommand
  ai_interpretation:        "AI interpretation:",
  ai_interpretation_failed: "AI interpretation failed:",
  ai_executing_original:    "Executing original command...",
  exec_failed:              "Error executing command:",
  // shell.ts — printHelp
  help_header:           "── Obsidian Shell Help ──",
  help_builtins_section: "Built-in commands:",
  help_help:             "Show this help",
  help_clear:            "Clear the screen",
  help_history:          "Show command history",
  help_exit:             "Exit the shell",
  help_ai_section:       "AI Features:",
  help_ai_enabled:       "Natural language commands are automatically interpreted",
  help_ai_disabled:      "AI assistance is off; commands run as typed",
  help_examples:         "Examples:",
  // shell.ts — printHistory
  history_header: "── Command History ──",
  history_empty:  "(no commands yet)",
  // shell.ts — close
  bye: "Bye.",
  // cli.ts — config
  config_header:       "── Obsidian Shell Configuration ──",
  config_ai_enabled:   "AI Enabled",
  config_gui_enabled:  "GUI Enabled",
  config_history_path: "History Path",
  config_model_path:   "Model Path",
  config_api_endpoint: "API Endpoint",
  config_max_tokens:   "Max Tokens",
  config_temperature:  "Temperature",
  config_lang:         "Language",
  // cli.ts — update-models
  models_updating:    "Updating AI models...",
  models_downloading: "Downloading latest AI models...",
  models_updated:     "Models updated successfully!",
  // cli.ts — errors
  config_load_failed: "Failed to load configuration:",
} as const;

export type Translations = { [K in keyof typeof en]: string };
