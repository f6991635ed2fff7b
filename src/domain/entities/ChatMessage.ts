export interface ChatMessage {
  date: string; // M/D/YY as exported
  time: string; // h:mm AM/PM
  sender?: string; // absent for system lines
  text: string;
}
