export function loginPage(token = "test-token", salt = "7"): string {
  return `<html><head><title>Login</title></head><body>
<form method="post">
  <input name="__RequestVerificationToken" type="hidden" value="${token}" />
  <input id="PasswordSalt" name="PasswordSalt" type="hidden" value="${salt}" />
  <input name="UserName" /><input name="Password" type="password" />
</form></body></html>`;
}

export function homePage(title = "Hem - Aptusportal"): string {
  return `<html><head><title>${title}</title></head><body><div id="main">Welcome</div></body></html>`;
}

export interface IntervalSpec {
  time: string;
  classes?: string;
}

export interface DaySpec {
  dayOfMonth?: number;
  intervals: IntervalSpec[];
}

export function calendarPage(days: DaySpec[], extra = ""): string {
  const columns = days
    .map((day) => {
      const label = day.dayOfMonth === undefined ? "" : `<div class="dayOfMonth">${day.dayOfMonth}</div>`;
      const intervals = day.intervals
        .map((i) => `<div class="interval ${i.classes ?? ""}"><div class="info">Bastu</div><div>${i.time}</div></div>`)
        .join("\n");
      return `<div class="dayColumn">${label}${intervals}</div>`;
    })
    .join("\n");
  return `<html><head><title>Bokning - Aptusportal</title></head><body>${extra}<div class="calendar">${columns}</div></body></html>`;
}
