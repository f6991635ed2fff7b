export interface DepositRow {
  date: string;
  time: string;
  name: string;
  phone: string;
  amount: number;
  howSaved: string; // original message text
}
